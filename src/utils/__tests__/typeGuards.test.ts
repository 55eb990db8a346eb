import { WebError } from "@core/errors/WebError";
import { DisplayError } from "@core/errors/DisplayError";
import {
  toError,
  isNodeJSErrnoException,
  extractErrorInfo,
} from "../typeGuards";

describe("typeGuards", () => {
  describe("toError", () => {
    it("should return Error instances unchanged", () => {
      const error = new Error("test error");
      expect(toError(error)).toBe(error);
    });

    it("should convert string to Error", () => {
      const result = toError("string error");
      expect(result).toBeInstanceOf(Error);
      expect(result.message).toBe("string error");
    });

    it("should convert object with message property to Error", () => {
      const result = toError({ message: "object error" });
      expect(result).toBeInstanceOf(Error);
      expect(result.message).toBe("object error");
    });

    it.each([
      [42, "42"],
      [null, "null"],
      [undefined, "undefined"],
    ])("should stringify %p", (value, message) => {
      const result = toError(value);
      expect(result).toBeInstanceOf(Error);
      expect(result.message).toBe(message);
    });

    it("should preserve custom Error subclasses", () => {
      const webError = WebError.notFound("/api/missing");
      expect(toError(webError)).toBe(webError);
      expect(toError(webError)).toBeInstanceOf(WebError);
    });
  });

  describe("isNodeJSErrnoException", () => {
    it.each([{ code: "ENOENT" }, { errno: -2 }, { syscall: "rename" }])(
      "should accept an Error carrying %p",
      (extra) => {
        const error = Object.assign(new Error("fs failure"), extra);
        expect(isNodeJSErrnoException(error)).toBe(true);
      },
    );

    it("should return false for plain Error", () => {
      const error = new Error("plain error");
      expect(isNodeJSErrnoException(error)).toBe(false);
    });

    it("should accept a system error that is not an Error instance", () => {
      const foreign = { message: "ENOENT: no such file", code: "ENOENT" };
      expect(foreign instanceof Error).toBe(false);
      expect(isNodeJSErrnoException(foreign)).toBe(true);
    });

    it("should return false for objects without a message", () => {
      expect(isNodeJSErrnoException({ code: "ENOENT" })).toBe(false);
      expect(isNodeJSErrnoException(null)).toBe(false);
      expect(isNodeJSErrnoException("error")).toBe(false);
    });
  });

  describe("extractErrorInfo", () => {
    it("should use the user message of a BaseError", () => {
      const info = extractErrorInfo(DisplayError.displayBusy());
      expect(info).toEqual({
        code: "DISPLAY_BUSY",
        message: "Display is busy. Please wait.",
      });
    });

    it("should return UNKNOWN_ERROR code for plain Error", () => {
      const error = new Error("plain error message");
      const info = extractErrorInfo(error);
      expect(info.code).toBe("UNKNOWN_ERROR");
      expect(info.message).toBe("plain error message");
    });

    it("should handle mock error-like objects", () => {
      const mockError = {
        code: "MOCK_ERROR",
        getUserMessage: () => "Mock error message",
      };
      const info = extractErrorInfo(mockError);
      expect(info.code).toBe("MOCK_ERROR");
      expect(info.message).toBe("Mock error message");
    });

    it("should handle unknown error types", () => {
      const info = extractErrorInfo("string error");
      expect(info.code).toBe("UNKNOWN_ERROR");
      expect(info.message).toBe("string error");
    });
  });
});
