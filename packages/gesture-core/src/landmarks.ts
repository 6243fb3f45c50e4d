import { z } from "zod";
import type { Vec3 } from "@handcad/session-core";
import { MalformedHandError } from "./errors";
import type { ExtensionJoint, Finger, FingertipIndex, HandFrame, Landmark } from "./types";

/** MediaPipe hand topology. */
export const HandLandmark = {
  WRIST: 0,
  THUMB_CMC: 1,
  THUMB_MCP: 2,
  THUMB_IP: 3,
  THUMB_TIP: 4,
  INDEX_MCP: 5,
  INDEX_PIP: 6,
  INDEX_DIP: 7,
  INDEX_TIP: 8,
  MIDDLE_MCP: 9,
  MIDDLE_PIP: 10,
  MIDDLE_DIP: 11,
  MIDDLE_TIP: 12,
  RING_MCP: 13,
  RING_PIP: 14,
  RING_DIP: 15,
  RING_TIP: 16,
  PINKY_MCP: 17,
  PINKY_PIP: 18,
  PINKY_DIP: 19,
  PINKY_TIP: 20,
} as const;

export const LANDMARK_COUNT = 21;

export const FINGERTIPS: readonly FingertipIndex[] = [4, 8, 12, 16, 20];

/** Base joint (MCP for every finger, thumb included), middle joint (IP for the thumb) and tip of each finger. */
export const FINGER_JOINTS: Record<Finger, { mcp: number; pip: number; tip: FingertipIndex }> = {
  thumb: { mcp: HandLandmark.THUMB_MCP, pip: HandLandmark.THUMB_IP, tip: HandLandmark.THUMB_TIP },
  index: { mcp: HandLandmark.INDEX_MCP, pip: HandLandmark.INDEX_PIP, tip: HandLandmark.INDEX_TIP },
  middle: { mcp: HandLandmark.MIDDLE_MCP, pip: HandLandmark.MIDDLE_PIP, tip: HandLandmark.MIDDLE_TIP },
  ring: { mcp: HandLandmark.RING_MCP, pip: HandLandmark.RING_PIP, tip: HandLandmark.RING_TIP },
  pinky: { mcp: HandLandmark.PINKY_MCP, pip: HandLandmark.PINKY_PIP, tip: HandLandmark.PINKY_TIP },
};

export function referenceJoint(finger: Finger, joint: ExtensionJoint): number {
  return FINGER_JOINTS[finger][joint];
}

export const LandmarkSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
});

export const LandmarkSetSchema = z.array(LandmarkSchema).length(LANDMARK_COUNT);

export const TrackedHandSchema = z.object({
  handIndex: z.number().int().nonnegative(),
  handedness: z.enum(["Left", "Right"]),
  landmarks: LandmarkSetSchema,
});

export const HandFrameSchema = z.object({
  timestamp: z.number().finite(),
  hands: z.array(z.unknown()),
});

const HandIndexListSchema = z
  .array(z.number())
  .refine((indices) => new Set(indices).size === indices.length, { message: "duplicate handIndex" });

/** Throws MalformedHandError unless `landmarks` is exactly 21 finite points. */
export function assertLandmarkSet(landmarks: unknown, handIndex?: number): asserts landmarks is Landmark[] {
  const result = LandmarkSetSchema.safeParse(landmarks);
  if (!result.success) {
    throw new MalformedHandError(handIndex, result.error.issues);
  }
}

/** Validates every hand of a frame before any of them is processed. */
export function assertHandFrame(frame: HandFrame): void {
  const shape = HandFrameSchema.safeParse(frame);
  if (!shape.success) {
    throw new MalformedHandError(undefined, shape.error.issues);
  }
  frame.hands.forEach((hand, position) => {
    const result = TrackedHandSchema.safeParse(hand);
    if (!result.success) {
      throw new MalformedHandError(Number.isInteger(hand.handIndex) ? hand.handIndex : position, result.error.issues);
    }
  });
  const indices = HandIndexListSchema.safeParse(frame.hands.map((hand) => hand.handIndex));
  if (!indices.success) {
    throw new MalformedHandError(undefined, indices.error.issues);
  }
}

export function toVec3(landmark: Landmark): Vec3 {
  return [landmark.x, landmark.y, landmark.z];
}
