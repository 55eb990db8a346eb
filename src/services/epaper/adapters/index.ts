/**
 * Hardware adapters sit between the panel drivers and GPIO/SPI.
 */

export { MockAdapter } from "./MockAdapter";
export type { MockAdapterOptions, WireEntry } from "./MockAdapter";
export { SpidevAdapter } from "./SpidevAdapter";
export type { SpidevAdapterOptions } from "./SpidevAdapter";
