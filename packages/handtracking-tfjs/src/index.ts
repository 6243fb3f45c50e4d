export { HandModelError, StubHandModel, createTFJSHandModel } from "./model";
export type { HandModel, TFJSHandModelOptions } from "./model";
export { mapDetectionsToTrackedHands } from "./mapDetections";
export type { DetectedHand, DetectedKeypoint, FrameSize } from "./mapDetections";
export { defaultScheduler, startHandTracking } from "./startHandTracking";
export type { HandTracking, HandTrackingOptions, Scheduler, TrackingError, TrackingLogger } from "./startHandTracking";
