import { BaseError } from "@errors/BaseError";

// Create a concrete implementation for testing
class TestError extends BaseError {
  constructor(
    message: string,
    code: string = "TEST_ERROR",
    recoverable: boolean = false,
    context?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, code, recoverable, context, cause);
  }
}

describe("BaseError", () => {
  describe("constructor", () => {
    it("should create error with message and code", () => {
      const error = new TestError("Test message", "TEST_CODE");

      expect(error.message).toBe("Test message");
      expect(error.code).toBe("TEST_CODE");
      expect(error.recoverable).toBe(false);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it("should keep context and recoverable flag", () => {
      const context = { key: "value" };
      const error = new TestError("Test message", "TEST_CODE", true, context);

      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual(context);
    });

    it("should set the error name to the constructor name", () => {
      const error = new TestError("Test message");
      expect(error.name).toBe("TestError");
    });

    it("should be an instance of Error and of the subclass", () => {
      const error = new TestError("Test message");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(TestError);
    });

    it("should attach the cause when given", () => {
      const cause = new Error("SPI write failed");
      const error = new TestError("Panel update failed", "X", true, {}, cause);

      expect(error.cause).toBe(cause);
    });
  });

  describe("toJSON", () => {
    it("should serialize error to a plain object", () => {
      const error = new TestError(
        "Test message",
        "TEST_CODE",
        true,
        { key: "value" },
        new Error("root cause"),
      );
      const json = error.toJSON();

      expect(json.name).toBe("TestError");
      expect(json.message).toBe("Test message");
      expect(json.code).toBe("TEST_CODE");
      expect(json.recoverable).toBe(true);
      expect(json.context).toEqual({ key: "value" });
      expect(json.cause).toBe("root cause");
      expect(json.timestamp).toBe(error.timestamp.toISOString());
      expect(json.stack).toBeDefined();
    });

    it("should leave cause undefined without one", () => {
      expect(new TestError("m").toJSON().cause).toBeUndefined();
    });
  });

  describe("getUserMessage", () => {
    it("should return centralized user message for known error code", () => {
      const error = new TestError("Technical message", "DISPLAY_BUSY");
      expect(error.getUserMessage()).toBe("Display is busy. Please wait.");
    });

    it("should return fallback message for unknown error code", () => {
      const error = new TestError("Technical message", "UNKNOWN_CODE");
      expect(error.getUserMessage()).toBe(
        "An error occurred. Please try again.",
      );
    });

    it("should return category fallback for known category prefix", () => {
      const error = new TestError("Technical message", "MENU_FUTURE_ERROR");
      expect(error.getUserMessage()).toBe(
        "Menu error occurred. Please try again.",
      );
    });
  });
});
