import type { Finger, Handedness, HandFrame, Landmark, TrackedHand } from "../src";

export type Pose = Partial<Record<Finger, boolean>>;

const FINGER_X: Record<Exclude<Finger, "thumb">, number> = { index: 0.4, middle: 0.5, ring: 0.6, pinky: 0.7 };

/**
 * Upright right hand in image coordinates (y down). Folded fingertips sit below both
 * the PIP and the MCP joint, extended ones well above.
 */
export function handLandmarks(pose: Pose = {}): Landmark[] {
  const point = (x: number, y: number): Landmark => ({ x, y, z: 0 });
  const landmarks: Landmark[] = [
    point(0.5, 0.9),
    point(0.4, 0.85),
    point(0.35, 0.8),
    pose.thumb ? point(0.3, 0.75) : point(0.4, 0.75),
    pose.thumb ? point(0.25, 0.7) : point(0.45, 0.75),
  ];
  for (const finger of ["index", "middle", "ring", "pinky"] as const) {
    const x = FINGER_X[finger];
    landmarks.push(point(x, 0.6), point(x, 0.5), point(x, 0.45), point(x, pose[finger] ? 0.3 : 0.65));
  }
  return landmarks;
}

export function withPoint(landmarks: Landmark[], index: number, patch: Partial<Landmark>): Landmark[] {
  return landmarks.map((landmark, i) => (i === index ? { ...landmark, ...patch } : { ...landmark }));
}

export function translate(landmarks: Landmark[], dx: number, dy: number, dz = 0): Landmark[] {
  return landmarks.map(({ x, y, z }) => ({ x: x + dx, y: y + dy, z: z + dz }));
}

export const POSES = {
  fist: {},
  thumbsUp: { thumb: true },
  peace: { index: true, middle: true },
  openPalm: { thumb: true, index: true, middle: true, ring: true, pinky: true },
  rock: { index: true, pinky: true },
  point: { index: true },
} satisfies Record<string, Pose>;

/** Thumb, middle and ring out; the index tip curls onto the thumb tip 0.03 away. */
export function pinchLandmarks(): Landmark[] {
  return withPoint(handLandmarks({ thumb: true, middle: true, ring: true }), 8, { x: 0.28, y: 0.7 });
}

export function trackedHand(landmarks: Landmark[], handIndex = 0, handedness: Handedness = "Right"): TrackedHand {
  return { handIndex, handedness, landmarks };
}

export function frame(hands: TrackedHand[], timestamp: number): HandFrame {
  return { hands, timestamp };
}
