/**
 * Validation Module
 *
 * Exports validation schemas and middleware.
 */

export * from "./schemas";

export { validateBody, formatZodError } from "./middleware";
export type { ValidationErrorResponse } from "./middleware";
