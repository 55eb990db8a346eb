/**
 * Panel drivers
 *
 * To add a panel:
 * 1. Extend BaseEpaperDriver with the controller's command sequences
 * 2. Export it here
 * 3. Register it in ServiceContainer's driver registry
 */

export { BaseEpaperDriver } from "./BaseEpaperDriver";
export { Waveshare2in13V4Driver } from "./Waveshare2in13V4Driver";
export { MockDisplayDriver } from "./MockDisplayDriver";
export type { MockDisplayOptions } from "./MockDisplayDriver";
