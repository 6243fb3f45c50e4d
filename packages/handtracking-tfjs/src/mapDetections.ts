import type { Handedness, Landmark, TrackedHand } from "@handcad/gesture-core";

export interface DetectedKeypoint {
  x: number;
  y: number;
  z?: number;
}

/** Structural view of a hand-pose-detection `Hand`; both runtimes produce it. */
export interface DetectedHand {
  handedness?: string | { label?: string };
  keypoints?: DetectedKeypoint[];
  keypoints3D?: DetectedKeypoint[];
}

export interface FrameSize {
  videoWidth?: number;
  videoHeight?: number;
  width?: number;
  height?: number;
}

function readHandedness(value: DetectedHand["handedness"]): Handedness {
  const label = typeof value === "string" ? value : value?.label;
  return label === "Left" ? "Left" : "Right";
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function isNormalized(keypoints: DetectedKeypoint[]): boolean {
  return keypoints.every((kp) => kp.x >= 0 && kp.x <= 1 && kp.y >= 0 && kp.y <= 1);
}

/**
 * Converts detector output to tracked hands in normalized image coordinates. Pixel
 * keypoints are divided by the frame size; the hand index is the detection slot.
 */
export function mapDetectionsToTrackedHands(detections: DetectedHand[], size: FrameSize): TrackedHand[] {
  const width = size.videoWidth || size.width || 1;
  const height = size.videoHeight || size.height || 1;

  return detections.map((detection, handIndex) => {
    const keypoints = detection.keypoints ?? detection.keypoints3D ?? [];
    const depth = detection.keypoints3D ?? [];
    const normalized = isNormalized(keypoints);
    const landmarks: Landmark[] = keypoints.map((kp, i) => ({
      x: clamp01(normalized ? kp.x : kp.x / width),
      y: clamp01(normalized ? kp.y : kp.y / height),
      z: kp.z ?? depth[i]?.z ?? 0,
    }));
    return { handIndex, handedness: readHandedness(detection.handedness), landmarks };
  });
}
