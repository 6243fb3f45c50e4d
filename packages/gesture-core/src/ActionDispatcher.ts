import type { CadCommand, CadTool, NormalAction } from "@handcad/session-core";
import type { CoarseGesture } from "./types";

export interface ActionDispatcherOptions<G extends string, A> {
  actions: Record<G, A>;
  cooldownMs: number;
  /** Held, continuous gestures: never throttled and never start a cooldown. */
  exempt?: readonly NoInfer<G>[];
}

/** Cooldown-gated gesture → action mapping. One shared cooldown across all non-exempt gestures. */
export class ActionDispatcher<G extends string, A> {
  private readonly actions: Record<G, A>;
  private readonly cooldownMs: number;
  private readonly exempt: ReadonlySet<G>;
  private lastActionTime?: number;

  constructor(options: ActionDispatcherOptions<G, A>) {
    this.actions = options.actions;
    this.cooldownMs = options.cooldownMs;
    this.exempt = new Set(options.exempt ?? []);
  }

  dispatch(gesture: G | "unknown", now: number): A | null {
    if (gesture === "unknown") return null;
    if (this.exempt.has(gesture)) return this.actions[gesture];
    if (this.lastActionTime !== undefined && now - this.lastActionTime < this.cooldownMs) {
      return null;
    }
    this.lastActionTime = now;
    return this.actions[gesture];
  }

  reset(): void {
    this.lastActionTime = undefined;
  }
}

export const NORMAL_MODE_ACTIONS: Record<CoarseGesture, NormalAction> = {
  fist: "spawn_drone",
  peace: "fire_bullet",
  pinch: "spawn_box",
  thumbs_up: "rotate_objects",
  rock_sign: "explode",
  open_palm: "camera_control",
};

export function createNormalModeDispatcher(cooldownMs: number): ActionDispatcher<CoarseGesture, NormalAction> {
  return new ActionDispatcher({ actions: NORMAL_MODE_ACTIONS, cooldownMs, exempt: ["open_palm"] });
}

export const CAD_MODE_ACTIONS: Record<CadTool, CadCommand["type"]> = {
  select: "CAD_SELECT",
  create: "CAD_PLACE",
  move: "CAD_MOVE",
  scale: "CAD_SCALE",
  rotate: "CAD_ROTATE",
  extrude: "CAD_EXTRUDE",
};

/** In CAD mode the dispatch key is the active tool; only select and create are discrete. */
export function createCadModeDispatcher(cooldownMs: number): ActionDispatcher<CadTool, CadCommand["type"]> {
  return new ActionDispatcher({
    actions: CAD_MODE_ACTIONS,
    cooldownMs,
    exempt: ["move", "scale", "rotate", "extrude"],
  });
}
