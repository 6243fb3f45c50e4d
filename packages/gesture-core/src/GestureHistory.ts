import type { CoarseGesture, GestureHistoryEntry } from "./types";

/** Bounded, insertion-ordered record of accepted gestures. Appends closer together than the cooldown are ignored. */
export class GestureHistory {
  private entries: GestureHistoryEntry[] = [];
  private lastAppend?: number;

  constructor(
    private readonly capacity: number,
    private readonly cooldownMs: number
  ) {}

  /** Returns true when the entry was recorded. */
  record(gesture: CoarseGesture, timestamp: number): boolean {
    if (this.lastAppend !== undefined && timestamp - this.lastAppend < this.cooldownMs) {
      return false;
    }
    this.entries.push({ gesture, timestamp });
    if (this.entries.length > this.capacity) {
      this.entries.shift();
    }
    this.lastAppend = timestamp;
    return true;
  }

  getEntries(): GestureHistoryEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  clear(): void {
    this.entries = [];
    this.lastAppend = undefined;
  }
}
