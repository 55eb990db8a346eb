/**
 * Validation Middleware
 *
 * Express middleware for validating request bodies with Zod schemas.
 * Provides consistent error responses and fills in schema defaults.
 */

import { Request, Response, NextFunction, RequestHandler } from "express";
import { z } from "zod";
import { getLogger } from "@utils/logger";

const logger = getLogger("ValidationMiddleware");

/**
 * Validation error response format
 */
export interface ValidationErrorResponse {
  success: false;
  error: {
    code: "VALIDATION_ERROR";
    message: string;
    details?: Array<{
      field: string;
      message: string;
    }>;
  };
}

/**
 * Format Zod error into a user-friendly response
 */
export function formatZodError(error: z.ZodError): ValidationErrorResponse {
  const issues = error.issues;
  const details = issues.map((issue) => ({
    field: issue.path.join(".") || "body",
    message: issue.message,
  }));

  const firstIssue = issues[0];
  const fieldPath = firstIssue.path.join(".");
  const message = fieldPath
    ? `${fieldPath}: ${firstIssue.message}`
    : firstIssue.message;

  return {
    success: false,
    error: {
      code: "VALIDATION_ERROR",
      message,
      details,
    },
  };
}

/**
 * Create middleware that validates request body against a Zod schema
 *
 * @example
 * ```typescript
 * app.post('/api/feed',
 *   validateBody(deviceActionSchema),
 *   (req, res) => controller.receiveFeed(req, res),
 * );
 * ```
 */
export function validateBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    // A request without a JSON body arrives as undefined or {}
    const result = schema.safeParse(req.body ?? {});

    if (!result.success) {
      logger.debug(
        `Body validation failed for ${req.method} ${req.path}:`,
        result.error.issues,
      );
      res.status(400).json(formatZodError(result.error));
      return;
    }

    // Replace body with parsed data, defaults included
    req.body = result.data;
    next();
  };
}
