import { countExtended, fingerStates, pinchDistance } from "./geometry";
import { GestureHistory } from "./GestureHistory";
import { assertLandmarkSet } from "./landmarks";
import { resolveOptions } from "./options";
import type { ResolvedGestureOptions } from "./options";
import { COARSE_GESTURES } from "./types";
import type {
  Classification,
  CoarseGesture,
  GestureConfidence,
  GestureEngineOptions,
  GestureHistoryEntry,
  GestureLabel,
  Landmark,
} from "./types";

const DISPLAY_NAMES: Record<GestureLabel, string> = {
  fist: "FIST",
  thumbs_up: "THUMBS UP",
  peace: "PEACE",
  open_palm: "OPEN PALM",
  pinch: "PINCH",
  rock_sign: "ROCK SIGN",
  unknown: "UNKNOWN",
};

export function gestureDisplayName(gesture: GestureLabel): string {
  return DISPLAY_NAMES[gesture];
}

export function emptyConfidence(): GestureConfidence {
  return { fist: 0, thumbs_up: 0, peace: 0, open_palm: 0, pinch: 0, rock_sign: 0 };
}

/**
 * Scores the six coarse gestures independently and picks the strongest. Rules overlap on
 * purpose (a raised thumb alone is also a fist by count), so the fixed confidences double
 * as priorities.
 */
export function scoreGestures(landmarks: Landmark[], options: ResolvedGestureOptions): GestureConfidence {
  const states = fingerStates(landmarks, options.coarseExtensionJoint, options.thumbAlignmentThreshold);
  const extended = countExtended(states);
  const { thumb, index, middle, ring, pinky } = states;
  const confidences = emptyConfidence();

  if (extended <= 1) confidences.fist = 0.8;
  if (thumb && !index && !middle && !ring && !pinky) confidences.thumbs_up = 0.9;
  if (!thumb && index && middle && !ring && !pinky) confidences.peace = 0.9;
  if (extended >= 4) confidences.open_palm = 0.9;
  if (pinchDistance(landmarks) < options.pinchThreshold) confidences.pinch = 0.8;
  if (index && !middle && !ring && pinky) confidences.rock_sign = 0.8;

  return confidences;
}

export function pickGesture(confidences: GestureConfidence, acceptanceThreshold: number): GestureLabel {
  let best: CoarseGesture = COARSE_GESTURES[0];
  for (const gesture of COARSE_GESTURES) {
    if (confidences[gesture] > confidences[best]) best = gesture;
  }
  return confidences[best] > acceptanceThreshold ? best : "unknown";
}

export class GestureClassifier {
  private readonly options: ResolvedGestureOptions;
  private readonly history: GestureHistory;
  private lastConfidences: GestureConfidence = emptyConfidence();

  constructor(opts?: GestureEngineOptions) {
    this.options = resolveOptions(opts);
    this.history = new GestureHistory(this.options.historyCapacity, this.options.gestureCooldownMs);
  }

  classify(landmarks: Landmark[], timestamp: number): Classification {
    assertLandmarkSet(landmarks);
    const confidences = scoreGestures(landmarks, this.options);
    this.lastConfidences = confidences;
    const gesture = pickGesture(confidences, this.options.acceptanceThreshold);
    if (gesture !== "unknown") {
      this.history.record(gesture, timestamp);
    }
    return { gesture, confidences: { ...confidences } };
  }

  /** Scores from the most recent `classify`, for display. */
  getConfidences(): GestureConfidence {
    return { ...this.lastConfidences };
  }

  getHistory(): GestureHistoryEntry[] {
    return this.history.getEntries();
  }

  reset(): void {
    this.history.clear();
    this.lastConfidences = emptyConfidence();
  }
}
