import { z } from "zod";
import { InvalidOptionsError } from "./errors";
import type { GestureEngineOptions } from "./types";

const DEFAULTS: Required<GestureEngineOptions> = {
  pinchThreshold: 0.05,
  thumbAlignmentThreshold: 0.7,
  stabilityVelocityThreshold: 0.01,
  spreadThreshold: 0.3,
  acceptanceThreshold: 0.5,
  toolAcceptanceThreshold: 0.8,
  gestureCooldownMs: 1000,
  actionCooldownMs: 800,
  toolCooldownMs: 1000,
  modeToggleHoldMs: 1000,
  historyCapacity: 10,
  processNoise: 0.01,
  measurementNoise: 0.1,
  initialCovariance: 0.1,
  coarseExtensionJoint: "pip",
  precisionExtensionJoint: "mcp",
  initialMode: "normal",
};

const unit = z.number().min(0).max(1);
const duration = z.number().finite().nonnegative();
const variance = z.number().finite().positive();

const OptionsSchema = z.object({
  pinchThreshold: z.number().finite().positive(),
  thumbAlignmentThreshold: z.number().min(-1).max(1),
  stabilityVelocityThreshold: z.number().finite().positive(),
  spreadThreshold: z.number().finite().nonnegative(),
  acceptanceThreshold: unit,
  toolAcceptanceThreshold: unit,
  gestureCooldownMs: duration,
  actionCooldownMs: duration,
  toolCooldownMs: duration,
  modeToggleHoldMs: z.number().finite().positive(),
  historyCapacity: z.number().int().positive(),
  processNoise: variance,
  measurementNoise: variance,
  initialCovariance: variance,
  coarseExtensionJoint: z.enum(["pip", "mcp"]),
  precisionExtensionJoint: z.enum(["pip", "mcp"]),
  initialMode: z.enum(["normal", "cad"]),
});

export type ResolvedGestureOptions = Required<GestureEngineOptions>;

/** Merges overrides over the defaults and rejects values no component can work with. */
export function resolveOptions(opts?: GestureEngineOptions): ResolvedGestureOptions {
  const merged: ResolvedGestureOptions = { ...DEFAULTS, ...(opts ?? {}) };
  const result = OptionsSchema.safeParse(merged);
  if (!result.success) {
    throw new InvalidOptionsError(result.error.issues);
  }
  return merged;
}

export { DEFAULTS as defaultGestureEngineOptions };
