/**
 * Tests for Validation Middleware
 */

import { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { validateBody, formatZodError } from "../middleware";
import { messageRequestSchema } from "../schemas";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

describe("Validation Middleware", () => {
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let mockNext: NextFunction;
  let jsonMock: jest.Mock;
  let statusMock: jest.Mock;

  beforeEach(() => {
    jsonMock = jest.fn();
    statusMock = jest.fn().mockReturnValue({ json: jsonMock });
    mockRequest = {
      method: "POST",
      path: "/api/message",
      body: {},
    };
    mockResponse = {
      status: statusMock,
      json: jsonMock,
    };
    mockNext = jest.fn();
  });

  describe("validateBody", () => {
    it("should call next() and fill defaults on a valid body", () => {
      mockRequest.body = { message: "hello" };
      const middleware = validateBody(messageRequestSchema);

      middleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(mockRequest.body).toEqual({
        from_device: "unknown",
        message: "hello",
        type: "text",
      });
    });

    it("should treat a missing body as empty", () => {
      mockRequest.body = undefined;
      const middleware = validateBody(
        z.object({ from_device: z.string().default("unknown") }),
      );

      middleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockNext).toHaveBeenCalled();
      expect(mockRequest.body).toEqual({ from_device: "unknown" });
    });

    it("should return 400 with the first issue as message", () => {
      mockRequest.body = { message: "" };
      const middleware = validateBody(messageRequestSchema);

      middleware(mockRequest as Request, mockResponse as Response, mockNext);

      expect(mockNext).not.toHaveBeenCalled();
      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        success: false,
        error: {
          code: "VALIDATION_ERROR",
          message: "message: message must not be empty",
          details: [{ field: "message", message: "message must not be empty" }],
        },
      });
    });
  });

  describe("formatZodError", () => {
    it("should use 'body' as field for root-level errors", () => {
      const result = z.string().safeParse(42);
      if (result.success) {
        throw new Error("expected a validation failure");
      }

      const response = formatZodError(result.error);

      expect(response.error.details?.[0].field).toBe("body");
    });

    it("should join nested paths with dots", () => {
      const result = z
        .object({ pet: z.object({ name: z.string() }) })
        .safeParse({ pet: { name: 1 } });
      if (result.success) {
        throw new Error("expected a validation failure");
      }

      expect(formatZodError(result.error).error.details?.[0].field).toBe(
        "pet.name",
      );
    });
  });
});
