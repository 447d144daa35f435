export type { FrameProvider, TrackerFactory, TrackerHandle, TrackerKind, TrackerUpdate } from "./TrackerPort";
export { TRACKER_KINDS, isTrackerKind } from "./TrackerPort";
export type { TemplateTrackerPreset } from "./adapters/templateTracker";
export { TRACKER_PRESETS, TemplateTracker, buildLumaFrame, resolveTrackerPreset } from "./adapters/templateTracker";
export { DEFAULT_TRACKER_KIND, createTracker, createTrackerFactory } from "./trackerFactory";
export type { AdvanceOptions, TrackerBinding, TrackingControllerOptions, TrackingFailureReason } from "./TrackingController";
export { TrackingController, wrapIndex } from "./TrackingController";
export type { TrackerScript } from "./mock/scriptedTracker";
export { ScriptedTracker, shiftEachFrame } from "./mock/scriptedTracker";
export { InMemoryFrameProvider, createIndexedFrames, createSolidFrame } from "./mock/memoryFrames";
