/**
 * Core interfaces for the pet clock
 *
 * Services depend on these contracts rather than on each other, so the
 * ServiceContainer can swap hardware for mocks and tests can inject fakes.
 */

// Panel
export * from "./IHardwareAdapter";
export * from "./IEpaperDriver";
export * from "./IEpaperService";
export * from "./IFrameBuffer";

// Refresh and navigation
export * from "./IRefreshCoordinator";
export * from "./IMenu";
export * from "./IMenuStateMachine";
export * from "./IAnimationScheduler";

// Input and events
export * from "./IButtonEventSource";
export * from "./IInboundEventChannel";

// State and companion
export * from "./IStateServices";
export * from "./ICompanionClient";

// HTTP
export * from "./IApiServer";
