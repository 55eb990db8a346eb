/**
 * Core types for the pet clock
 *
 * This barrel file exports all type definitions used throughout the application.
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./DisplayTypes";
export * from "./PetTypes";
export * from "./MenuTypes";
export * from "./ButtonTypes";
export * from "./StateTypes";
export * from "./EventTypes";
