export * from "./types";
export { GestureEngine } from "./GestureEngine";
export { GestureClassifier, emptyConfidence, gestureDisplayName, pickGesture, scoreGestures } from "./GestureClassifier";
export { GestureHistory } from "./GestureHistory";
export { LandmarkFilter } from "./LandmarkFilter";
export type { FingertipFilterState } from "./LandmarkFilter";
export { PrecisionGestureDetector, fingerSpread } from "./PrecisionGestureDetector";
export { TOOL_CONFIDENCE, classifyTool, matchTool } from "./ToolClassifier";
export { ModeToggle } from "./ModeToggle";
export {
  ActionDispatcher,
  CAD_MODE_ACTIONS,
  NORMAL_MODE_ACTIONS,
  createCadModeDispatcher,
  createNormalModeDispatcher,
} from "./ActionDispatcher";
export type { ActionDispatcherOptions } from "./ActionDispatcher";
export {
  FORWARD,
  IDENTITY_ROTATION,
  countExtended,
  distance,
  fingerDirection,
  fingerStates,
  handOrientation,
  isAllExtended,
  isFingerExtended,
  isThumbExtended,
  midpoint,
  pinchDistance,
  pointingDirection,
  secondaryFingerDirection,
  stablePalmCenter,
} from "./geometry";
export {
  FINGERTIPS,
  FINGER_JOINTS,
  HandLandmark,
  LANDMARK_COUNT,
  LandmarkSchema,
  LandmarkSetSchema,
  HandFrameSchema,
  TrackedHandSchema,
  assertHandFrame,
  assertLandmarkSet,
  toVec3,
} from "./landmarks";
export { defaultGestureEngineOptions, resolveOptions } from "./options";
export type { ResolvedGestureOptions } from "./options";
export { InvalidOptionsError, MalformedHandError } from "./errors";
