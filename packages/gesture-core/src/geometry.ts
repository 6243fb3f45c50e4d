import { Matrix4, Quaternion, Vector3 } from "three";
import type { Vec3 } from "@handcad/session-core";
import { FINGER_JOINTS, HandLandmark, referenceJoint } from "./landmarks";
import { defaultGestureEngineOptions } from "./options";
import type { ExtensionJoint, Finger, FingerStates, Landmark, Quat } from "./types";

export const IDENTITY_ROTATION: Quat = [0, 0, 0, 1];
export const FORWARD: Vec3 = [0, 0, 1];

const PALM_POINTS = [
  HandLandmark.WRIST,
  HandLandmark.THUMB_CMC,
  HandLandmark.INDEX_MCP,
  HandLandmark.MIDDLE_MCP,
  HandLandmark.RING_MCP,
  HandLandmark.PINKY_MCP,
];

// Cross products this small mean the palm vectors are colinear.
const DEGENERATE_EPSILON = 1e-12;

function vector(landmark: Landmark): Vector3 {
  return new Vector3(landmark.x, landmark.y, landmark.z);
}

/**
 * The thumb folds sideways, so a y comparison says nothing about it. Instead compare the
 * direction of the palm-side segment (wrist to MCP) with the finger segment (MCP to tip)
 * in the image plane: an extended thumb keeps them roughly aligned.
 */
export function isThumbExtended(
  landmarks: Landmark[],
  threshold: number = defaultGestureEngineOptions.thumbAlignmentThreshold
): boolean {
  const wrist = landmarks[HandLandmark.WRIST];
  const mcp = landmarks[HandLandmark.THUMB_MCP];
  const tip = landmarks[HandLandmark.THUMB_TIP];
  const base = { x: mcp.x - wrist.x, y: mcp.y - wrist.y };
  const finger = { x: tip.x - mcp.x, y: tip.y - mcp.y };
  const baseLength = Math.hypot(base.x, base.y);
  const fingerLength = Math.hypot(finger.x, finger.y);
  if (baseLength === 0 || fingerLength === 0) return false;
  const cosine = (base.x * finger.x + base.y * finger.y) / (baseLength * fingerLength);
  return cosine > threshold;
}

/** Image y grows downward, so an extended finger has its tip above (smaller y than) the joint. */
export function isFingerExtended(landmarks: Landmark[], finger: Exclude<Finger, "thumb">, joint: ExtensionJoint): boolean {
  return landmarks[FINGER_JOINTS[finger].tip].y < landmarks[referenceJoint(finger, joint)].y;
}

export function fingerStates(
  landmarks: Landmark[],
  joint: ExtensionJoint,
  thumbThreshold: number = defaultGestureEngineOptions.thumbAlignmentThreshold
): FingerStates {
  return {
    thumb: isThumbExtended(landmarks, thumbThreshold),
    index: isFingerExtended(landmarks, "index", joint),
    middle: isFingerExtended(landmarks, "middle", joint),
    ring: isFingerExtended(landmarks, "ring", joint),
    pinky: isFingerExtended(landmarks, "pinky", joint),
  };
}

export function countExtended(states: FingerStates): number {
  return Object.values(states).filter(Boolean).length;
}

/** All five fingers out, fingers measured against their MCP joints. */
export function isAllExtended(
  landmarks: Landmark[],
  thumbThreshold: number = defaultGestureEngineOptions.thumbAlignmentThreshold
): boolean {
  return countExtended(fingerStates(landmarks, "mcp", thumbThreshold)) === 5;
}

export function pinchDistance(landmarks: Landmark[]): number {
  return vector(landmarks[HandLandmark.THUMB_TIP]).distanceTo(vector(landmarks[HandLandmark.INDEX_TIP]));
}

export function distance(a: Landmark, b: Landmark): number {
  return vector(a).distanceTo(vector(b));
}

export function midpoint(a: Landmark, b: Landmark): Vec3 {
  return [(a.x + b.x) / 2, (a.y + b.y) / 2, (a.z + b.z) / 2];
}

/** Mean of the wrist and the finger bases, which jitter far less than the tips. */
export function stablePalmCenter(landmarks: Landmark[]): Vec3 {
  const sum = PALM_POINTS.reduce(
    (acc, index) => {
      const point = landmarks[index];
      acc[0] += point.x;
      acc[1] += point.y;
      acc[2] += point.z;
      return acc;
    },
    [0, 0, 0]
  );
  return [sum[0] / PALM_POINTS.length, sum[1] / PALM_POINTS.length, sum[2] / PALM_POINTS.length];
}

/**
 * Rotation of the palm frame built from wrist→middle MCP (x axis) and the palm normal
 * (z axis). Identity when the two palm vectors are zero-length or colinear.
 */
export function handOrientation(landmarks: Landmark[]): Quat {
  const wrist = vector(landmarks[HandLandmark.WRIST]);
  const toMiddle = vector(landmarks[HandLandmark.MIDDLE_MCP]).sub(wrist);
  const toPinky = vector(landmarks[HandLandmark.PINKY_MCP]).sub(wrist);
  if (toMiddle.lengthSq() === 0 || toPinky.lengthSq() === 0) return [...IDENTITY_ROTATION];

  toMiddle.normalize();
  toPinky.normalize();
  const normal = new Vector3().crossVectors(toMiddle, toPinky);
  if (normal.lengthSq() < DEGENERATE_EPSILON) return [...IDENTITY_ROTATION];
  normal.normalize();

  const side = new Vector3().crossVectors(normal, toMiddle);
  const basis = new Matrix4().makeBasis(toMiddle, side, normal);
  const q = new Quaternion().setFromRotationMatrix(basis);
  return [q.x, q.y, q.z, q.w];
}

/** Unit vector from a finger's PIP joint to its tip; FORWARD when the two coincide. */
export function fingerDirection(landmarks: Landmark[], finger: Finger): Vec3 {
  const joints = FINGER_JOINTS[finger];
  const direction = vector(landmarks[joints.tip]).sub(vector(landmarks[joints.pip]));
  const length = direction.length();
  if (length === 0) return [...FORWARD];
  return [direction.x / length, direction.y / length, direction.z / length];
}

export function pointingDirection(landmarks: Landmark[]): Vec3 {
  return fingerDirection(landmarks, "index");
}

export function secondaryFingerDirection(landmarks: Landmark[]): Vec3 {
  return fingerDirection(landmarks, "middle");
}
