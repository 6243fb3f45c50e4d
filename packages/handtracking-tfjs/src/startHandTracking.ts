import { GestureEngine, MalformedHandError } from "@handcad/gesture-core";
import type { GestureEngineOptions, GestureSnapshot, TrackedHand } from "@handcad/gesture-core";
import { SnapshotChannel } from "@handcad/session-core";
import type { HandModel } from "./model";

export type TrackingError =
  | { type: "estimate-failed"; error: unknown }
  | { type: "malformed-hand"; error: MalformedHandError };

/** Runs `tick` once, later; returns a function that cancels it if it has not run yet. */
export type Scheduler = (tick: () => void) => () => void;

export type TrackingLogger = Pick<Console, "error">;

export interface HandTrackingOptions<Source> {
  model: HandModel<Source>;
  source: Source;
  engine?: GestureEngine;
  gestureOptions?: GestureEngineOptions;
  channel?: SnapshotChannel<GestureSnapshot>;
  /** Upper bound on processed frames per second; ticks arriving sooner are skipped. */
  fps?: number;
  onSnapshot?: (snapshot: GestureSnapshot) => void;
  onError?: (error: TrackingError) => void;
  schedule?: Scheduler;
  /** Millisecond clock stamped on each frame. */
  now?: () => number;
  logger?: TrackingLogger;
}

export interface HandTracking {
  readonly engine: GestureEngine;
  readonly channel: SnapshotChannel<GestureSnapshot>;
  isRunning(): boolean;
  stop(): void;
}

export const defaultScheduler: Scheduler = (tick) => {
  if (typeof requestAnimationFrame === "function") {
    const handle = requestAnimationFrame(() => tick());
    return () => cancelAnimationFrame(handle);
  }
  const handle = setTimeout(tick, 16);
  return () => clearTimeout(handle);
};

/**
 * Acquisition cadence: estimate, build the frame, run the engine, publish. At most one
 * estimate is in flight; the next tick is scheduled only once the current one finishes.
 */
export function startHandTracking<Source>(options: HandTrackingOptions<Source>): HandTracking {
  const { model, source, fps } = options;
  const engine = options.engine ?? new GestureEngine(options.gestureOptions);
  const channel = options.channel ?? new SnapshotChannel<GestureSnapshot>();
  const schedule = options.schedule ?? defaultScheduler;
  const now = options.now ?? (() => performance.now());
  const logger = options.logger ?? console;

  let running = true;
  let cancelPending: (() => void) | null = null;
  let lastFrameTs: number | undefined;

  function report(error: TrackingError): void {
    options.onError?.(error);
    logger.error("handtracking-tfjs frame failed", error);
  }

  function scheduleNext(): void {
    if (!running) return;
    cancelPending = schedule(() => {
      cancelPending = null;
      tick().catch((error: unknown) => {
        running = false;
        logger.error("handtracking-tfjs loop stopped", error);
      });
    });
  }

  async function tick(): Promise<void> {
    if (!running) return;
    const timestamp = now();
    if (fps && lastFrameTs !== undefined && timestamp - lastFrameTs < 1000 / fps) {
      scheduleNext();
      return;
    }
    lastFrameTs = timestamp;

    let hands: TrackedHand[];
    try {
      hands = await model.estimateHands(source);
    } catch (error) {
      report({ type: "estimate-failed", error });
      scheduleNext();
      return;
    }
    if (!running) return;

    try {
      const snapshot = engine.update({ hands, timestamp });
      channel.publish(snapshot);
      options.onSnapshot?.(snapshot);
    } catch (error) {
      if (!(error instanceof MalformedHandError)) throw error;
      report({ type: "malformed-hand", error });
    }
    scheduleNext();
  }

  scheduleNext();

  return {
    engine,
    channel,
    isRunning: () => running,
    stop() {
      running = false;
      cancelPending?.();
      cancelPending = null;
    },
  };
}
