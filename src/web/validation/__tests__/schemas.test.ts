import { deviceActionSchema, messageRequestSchema } from "../schemas";

describe("API schemas", () => {
  describe("messageRequestSchema", () => {
    it("should accept a full message", () => {
      expect(
        messageRequestSchema.parse({
          from_device: "other_clock",
          message: "hi",
          type: "poke",
        }),
      ).toEqual({ from_device: "other_clock", message: "hi", type: "poke" });
    });

    it("should accept exactly 200 characters and reject 201", () => {
      expect(
        messageRequestSchema.safeParse({ message: "x".repeat(200) }).success,
      ).toBe(true);
      expect(
        messageRequestSchema.safeParse({ message: "x".repeat(201) }).success,
      ).toBe(false);
    });

    it("should reject an unknown type", () => {
      const result = messageRequestSchema.safeParse({
        message: "hi",
        type: "shout",
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe(
          "type must be one of text, poke, feed",
        );
      }
    });

    it("should require a message", () => {
      expect(messageRequestSchema.safeParse({}).success).toBe(false);
    });
  });

  describe("deviceActionSchema", () => {
    it("should default the sender", () => {
      expect(deviceActionSchema.parse({})).toEqual({ from_device: "unknown" });
    });

    it("should reject an empty sender", () => {
      expect(deviceActionSchema.safeParse({ from_device: "" }).success).toBe(
        false,
      );
    });
  });
});
