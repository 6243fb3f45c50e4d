import { distance, fingerStates, midpoint, pinchDistance, pointingDirection, secondaryFingerDirection } from "./geometry";
import { HandLandmark, assertLandmarkSet, toVec3 } from "./landmarks";
import { resolveOptions } from "./options";
import type { ResolvedGestureOptions } from "./options";
import type { FilteredHand, GestureEngineOptions, Landmark, PrecisionGestures, SpreadScale } from "./types";

const SPREAD_TIPS = [HandLandmark.INDEX_TIP, HandLandmark.MIDDLE_TIP, HandLandmark.RING_TIP, HandLandmark.PINKY_TIP];

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Mean distance between neighbouring fingertips, index through pinky. */
export function fingerSpread(landmarks: Landmark[]): number {
  let total = 0;
  for (let i = 0; i < SPREAD_TIPS.length - 1; i++) {
    total += distance(landmarks[SPREAD_TIPS[i]], landmarks[SPREAD_TIPS[i + 1]]);
  }
  return total / (SPREAD_TIPS.length - 1);
}

/**
 * Continuous gestures for direct manipulation. Expects filtered landmarks: the
 * precision-point gate reads the index-tip velocity, which only the filter provides.
 */
export class PrecisionGestureDetector {
  private readonly options: ResolvedGestureOptions;

  constructor(opts?: GestureEngineOptions) {
    this.options = resolveOptions(opts);
  }

  detect(hand: Pick<FilteredHand, "landmarks" | "velocities">): PrecisionGestures {
    const { landmarks, velocities } = hand;
    assertLandmarkSet(landmarks);
    const { index, middle, ring, pinky } = fingerStates(
      landmarks,
      this.options.precisionExtensionJoint,
      this.options.thumbAlignmentThreshold
    );

    const gestures: PrecisionGestures = { spreadScale: this.spreadScale(landmarks) };

    const indexVelocity = velocities[HandLandmark.INDEX_TIP];
    const steady =
      indexVelocity !== undefined && Math.hypot(...indexVelocity) < this.options.stabilityVelocityThreshold;
    if (index && !middle && !ring && !pinky && steady) {
      gestures.precisionPoint = {
        confidence: 0.9,
        position: toVec3(landmarks[HandLandmark.INDEX_TIP]),
        direction: pointingDirection(landmarks),
      };
    }

    const pinch = pinchDistance(landmarks);
    if (pinch < this.options.pinchThreshold) {
      gestures.pinch = {
        confidence: 0.9,
        position: midpoint(landmarks[HandLandmark.THUMB_TIP], landmarks[HandLandmark.INDEX_TIP]),
        strength: clamp01(1 - pinch * 20),
      };
    }

    if (index && middle && ring && !pinky) {
      gestures.threeFingerControl = {
        confidence: 0.8,
        position: toVec3(landmarks[HandLandmark.MIDDLE_TIP]),
        direction: secondaryFingerDirection(landmarks),
      };
    }

    return gestures;
  }

  private spreadScale(landmarks: Landmark[]): SpreadScale {
    const spread = fingerSpread(landmarks);
    return {
      confidence: spread > this.options.spreadThreshold ? 0.7 : 0,
      scaleFactor: spread * 3,
    };
  }
}
