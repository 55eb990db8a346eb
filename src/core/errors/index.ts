/**
 * Core error classes for the pet clock
 *
 * All custom errors extend BaseError and carry an error code, a timestamp,
 * context data, a recoverable flag and a user-facing message from
 * ErrorMessages.ts.
 */

export * from "./BaseError";
export * from "./DisplayError";
export * from "./MenuError";
export * from "./StateError";
export * from "./ConfigError";
export * from "./WebError";
export * from "./CompanionError";
export * from "./ButtonError";
export * from "./ErrorMessages";
