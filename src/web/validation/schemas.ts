/**
 * API Request Validation Schemas
 *
 * Bodies sent by the companion device. Field names follow the wire format
 * both devices share.
 */

import { z } from "zod";
import { MESSAGES_MAX_LENGTH } from "@core/constants";

/**
 * Sender name; older senders omit it
 */
export const fromDeviceSchema = z
  .string({ message: "from_device must be a string" })
  .min(1, "from_device must not be empty")
  .max(64, "from_device must be at most 64 characters")
  .default("unknown");

/**
 * POST /api/message
 */
export const messageRequestSchema = z.object({
  from_device: fromDeviceSchema,
  message: z
    .string({ message: "message must be a string" })
    .min(1, "message must not be empty")
    .max(
      MESSAGES_MAX_LENGTH,
      `message must be at most ${MESSAGES_MAX_LENGTH} characters`,
    ),
  type: z
    .enum(["text", "poke", "feed"], {
      message: "type must be one of text, poke, feed",
    })
    .default("text"),
});

/**
 * POST /api/feed and POST /api/poke
 */
export const deviceActionSchema = z.object({
  from_device: fromDeviceSchema,
});

export type MessageRequest = z.infer<typeof messageRequestSchema>;
export type DeviceActionRequest = z.infer<typeof deviceActionSchema>;
