import type { SessionCommand, SnapshotLike } from "./types";

export const DEFAULT_MAX_CARRIED_COMMANDS = 256;

/** Commands that set a target for the next scene update; a newer one of the same kind replaces it. */
export function supersedingKey(command: SessionCommand): string | null {
  switch (command.type) {
    case "CAD_MOVE":
    case "CAD_SCALE":
    case "CAD_EXTRUDE":
      return command.type;
    case "ACTION":
      return command.action === "camera_control" ? command.action : null;
    default:
      return null;
  }
}

/**
 * Keeps only the newest superseding command of each kind between mode and tool changes.
 * Discrete commands and their order are untouched.
 */
export function coalesceCommands(commands: readonly SessionCommand[]): SessionCommand[] {
  const kept: SessionCommand[] = [];
  const seen = new Set<string>();
  for (let i = commands.length - 1; i >= 0; i--) {
    const command = commands[i];
    if (command.type === "MODE_TOGGLED" || command.type === "TOOL_SELECTED") seen.clear();
    const key = supersedingKey(command);
    if (key !== null) {
      if (seen.has(key)) continue;
      seen.add(key);
    }
    kept.push(command);
  }
  return kept.reverse();
}

/**
 * Single-slot handoff between the acquisition cadence (writer) and the scene cadence
 * (reader). Neither side blocks: `publish` overwrites the slot and `take` empties it.
 * When an unread snapshot is overwritten its commands are prepended to the new one,
 * so a slow reader still sees every toggle, tool change and action exactly once.
 * Carried target updates collapse to the newest, and the carried list is capped at
 * `maxCarriedCommands`, oldest dropped first.
 */
export class SnapshotChannel<T extends SnapshotLike> {
  private slot: T | null = null;
  private latest: T | null = null;
  private dropped = 0;
  private discardedCommands = 0;

  constructor(private readonly maxCarriedCommands = DEFAULT_MAX_CARRIED_COMMANDS) {}

  publish(snapshot: T): void {
    if (this.slot) {
      this.dropped += 1;
      let commands = coalesceCommands([...this.slot.commands, ...snapshot.commands]);
      const excess = commands.length - this.maxCarriedCommands;
      if (excess > 0) {
        this.discardedCommands += excess;
        commands = commands.slice(excess);
      }
      snapshot = { ...snapshot, commands };
    }
    this.slot = snapshot;
    this.latest = snapshot;
  }

  /** Returns the newest unread snapshot and empties the slot, or null when nothing new arrived. */
  take(): T | null {
    const snapshot = this.slot;
    this.slot = null;
    return snapshot;
  }

  /** Newest snapshot ever published, read or not. Commands may already have been consumed. */
  peek(): T | null {
    return this.latest;
  }

  /** Count of snapshots overwritten before the reader got to them. */
  getDroppedCount(): number {
    return this.dropped;
  }

  /** Count of carried commands lost to the cap. */
  getDiscardedCommandCount(): number {
    return this.discardedCommands;
  }
}
