import type { CadTool } from "@handcad/session-core";
import { fingerStates } from "./geometry";
import { assertLandmarkSet } from "./landmarks";
import { defaultGestureEngineOptions } from "./options";
import type { ExtensionJoint, FingerStates, Landmark, ToolSelection } from "./types";

type ToolPattern = { tool: CadTool; matches: (f: FingerStates) => boolean };

// Order matters: rotate and extrude share index+pinky and differ only by the thumb,
// and the four count-based patterns ignore the thumb entirely.
const TOOL_LADDER: readonly ToolPattern[] = [
  { tool: "select", matches: (f) => f.index && !f.middle && !f.ring && !f.pinky },
  { tool: "create", matches: (f) => f.index && f.middle && !f.ring && !f.pinky },
  { tool: "move", matches: (f) => f.index && f.middle && f.ring && !f.pinky },
  { tool: "scale", matches: (f) => f.index && f.middle && f.ring && f.pinky },
  { tool: "rotate", matches: (f) => f.thumb && f.index && !f.middle && !f.ring && f.pinky },
  { tool: "extrude", matches: (f) => !f.thumb && f.index && !f.middle && !f.ring && f.pinky },
];

export const TOOL_CONFIDENCE = 0.9;

export function matchTool(states: FingerStates): ToolSelection | null {
  const match = TOOL_LADDER.find((pattern) => pattern.matches(states));
  return match ? { tool: match.tool, confidence: TOOL_CONFIDENCE } : null;
}

export function classifyTool(
  landmarks: Landmark[],
  joint: ExtensionJoint = defaultGestureEngineOptions.precisionExtensionJoint,
  thumbThreshold: number = defaultGestureEngineOptions.thumbAlignmentThreshold
): ToolSelection | null {
  assertLandmarkSet(landmarks);
  return matchTool(fingerStates(landmarks, joint, thumbThreshold));
}
