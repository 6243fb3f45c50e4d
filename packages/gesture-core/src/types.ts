import type { CadTool, InteractionMode, SessionCommand, Vec3 } from "@handcad/session-core";

export type Handedness = "Left" | "Right";

export interface Landmark {
  x: number;
  y: number;
  z: number;
}

export interface TrackedHand {
  /** Detector slot, 0 or 1. The lowest index present is the primary hand. */
  handIndex: number;
  handedness: Handedness;
  landmarks: Landmark[];
}

export interface HandFrame {
  hands: TrackedHand[];
  /** Milliseconds. */
  timestamp: number;
}

/** x, y, z, w */
export type Quat = [number, number, number, number];

export const FINGERS = ["thumb", "index", "middle", "ring", "pinky"] as const;
export type Finger = (typeof FINGERS)[number];
export type FingerStates = Record<Finger, boolean>;

/** Joint a fingertip is compared against when deciding whether the finger is extended. */
export type ExtensionJoint = "pip" | "mcp";

export type FingertipIndex = 4 | 8 | 12 | 16 | 20;

export const COARSE_GESTURES = ["fist", "thumbs_up", "peace", "open_palm", "pinch", "rock_sign"] as const;
export type CoarseGesture = (typeof COARSE_GESTURES)[number];
export type GestureLabel = CoarseGesture | "unknown";
export type GestureConfidence = Record<CoarseGesture, number>;

export interface Classification {
  gesture: GestureLabel;
  confidences: GestureConfidence;
}

export interface GestureHistoryEntry {
  gesture: CoarseGesture;
  timestamp: number;
}

export interface FilteredHand {
  landmarks: Landmark[];
  /** Frame-to-frame fingertip displacement; empty on the first frame after (re)acquisition. */
  velocities: Partial<Record<FingertipIndex, Vec3>>;
  palmCenter: Vec3;
  orientation: Quat;
}

export interface PrecisionPoint {
  confidence: number;
  position: Vec3;
  direction: Vec3;
}

export interface PrecisionPinch {
  confidence: number;
  position: Vec3;
  /** 1 when the tips touch, 0 at the pinch threshold. */
  strength: number;
}

export interface SpreadScale {
  confidence: number;
  scaleFactor: number;
}

export interface ThreeFingerControl {
  confidence: number;
  position: Vec3;
  direction: Vec3;
}

export interface PrecisionGestures {
  precisionPoint?: PrecisionPoint;
  pinch?: PrecisionPinch;
  spreadScale: SpreadScale;
  threeFingerControl?: ThreeFingerControl;
}

export interface ToolSelection {
  tool: CadTool;
  confidence: number;
}

export type ModeTogglePhase = "idle" | "arming" | "cooling";

export interface ModeToggleStatus {
  phase: ModeTogglePhase;
  /** Fraction of the hold completed while arming, 0 otherwise. */
  progress: number;
}

export interface GestureEngineOptions {
  pinchThreshold?: number;
  thumbAlignmentThreshold?: number;
  stabilityVelocityThreshold?: number;
  spreadThreshold?: number;
  acceptanceThreshold?: number;
  toolAcceptanceThreshold?: number;
  gestureCooldownMs?: number;
  actionCooldownMs?: number;
  toolCooldownMs?: number;
  modeToggleHoldMs?: number;
  historyCapacity?: number;
  processNoise?: number;
  measurementNoise?: number;
  initialCovariance?: number;
  coarseExtensionJoint?: ExtensionJoint;
  precisionExtensionJoint?: ExtensionJoint;
  initialMode?: InteractionMode;
}

export interface HandResult {
  handIndex: number;
  handedness: Handedness;
  classification?: Classification;
  filtered?: FilteredHand;
  precision?: PrecisionGestures;
  tool?: ToolSelection | null;
}

export interface GestureSnapshot {
  timestamp: number;
  mode: InteractionMode;
  /** Primary-hand coarse result in normal mode; "unknown" otherwise. */
  gesture: GestureLabel;
  confidences: GestureConfidence | null;
  precision: PrecisionGestures | null;
  tool: CadTool;
  modeToggle: ModeToggleStatus;
  hands: HandResult[];
  commands: SessionCommand[];
}
