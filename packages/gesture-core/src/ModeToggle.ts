import type { ModeTogglePhase, ModeToggleStatus } from "./types";

/**
 * Hold-to-toggle timer. A single signed value carries the whole state:
 * 0 idle, positive = hold time still required, negative = cooldown still to run.
 */
export class ModeToggle {
  private timer = 0;

  constructor(private readonly holdMs: number) {}

  /** Advances by `dtMs` with the current pose; returns true on the frame the toggle fires. */
  update(poseHeld: boolean, dtMs: number): boolean {
    if (this.timer < 0) {
      this.timer = Math.min(0, this.timer + dtMs);
      return false;
    }

    if (!poseHeld) {
      this.timer = 0;
      return false;
    }

    if (this.timer === 0) {
      this.timer = this.holdMs;
      return false;
    }

    this.timer -= dtMs;
    if (this.timer <= 0) {
      this.timer = -this.holdMs;
      return true;
    }
    return false;
  }

  getPhase(): ModeTogglePhase {
    if (this.timer > 0) return "arming";
    if (this.timer < 0) return "cooling";
    return "idle";
  }

  getStatus(): ModeToggleStatus {
    const phase = this.getPhase();
    return { phase, progress: phase === "arming" ? 1 - this.timer / this.holdMs : 0 };
  }

  getTimer(): number {
    return this.timer;
  }

  reset(): void {
    this.timer = 0;
  }
}
