import { describe, expect, it, vi } from "vitest";
import { MalformedHandError } from "@handcad/gesture-core";
import type { GestureSnapshot, Landmark, TrackedHand } from "@handcad/gesture-core";
import { StubHandModel, startHandTracking } from "../src";
import type { HandModel, Scheduler, TrackingError } from "../src";

class ManualScheduler {
  private queue: Array<() => void> = [];

  readonly schedule: Scheduler = (tick) => {
    this.queue.push(tick);
    return () => {
      this.queue = this.queue.filter((queued) => queued !== tick);
    };
  };

  pending(): number {
    return this.queue.length;
  }

  /** Runs the next tick and lets its awaited work settle. */
  async step(): Promise<void> {
    this.queue.shift()?.();
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
}

function clock(times: number[]): () => number {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)];
}

// Closed hand: every fingertip below its joints, thumb tucked across the palm.
function fist(): TrackedHand {
  const point = (x: number, y: number): Landmark => ({ x, y, z: 0 });
  const landmarks = [point(0.5, 0.9), point(0.4, 0.85), point(0.35, 0.8), point(0.4, 0.75), point(0.45, 0.75)];
  for (const x of [0.4, 0.5, 0.6, 0.7]) {
    landmarks.push(point(x, 0.6), point(x, 0.5), point(x, 0.45), point(x, 0.65));
  }
  return { handIndex: 0, handedness: "Right", landmarks };
}

describe("startHandTracking", () => {
  it("runs the engine on each frame and publishes to the channel", async () => {
    const scheduler = new ManualScheduler();
    const snapshots: GestureSnapshot[] = [];
    const tracking = startHandTracking({
      model: { estimateHands: async (_source: string) => [fist()] },
      source: "camera",
      schedule: scheduler.schedule,
      now: clock([0, 1000]),
      onSnapshot: (snapshot) => snapshots.push(snapshot),
    });

    await scheduler.step();
    await scheduler.step();

    expect(snapshots.map((s) => s.timestamp)).toEqual([0, 1000]);
    const latest = tracking.channel.take();
    expect(latest?.timestamp).toBe(1000);
    expect(latest?.commands).toEqual([
      { type: "ACTION", action: "spawn_drone", position: [0.4, 0.65, 0] },
      { type: "ACTION", action: "spawn_drone", position: [0.4, 0.65, 0] },
    ]);
    expect(tracking.channel.getDroppedCount()).toBe(1);
    tracking.stop();
  });

  it("skips ticks that arrive before the fps interval", async () => {
    const scheduler = new ManualScheduler();
    const estimateHands = vi.fn(async (_source: string) => [fist()]);
    const tracking = startHandTracking({
      model: { estimateHands },
      source: "camera",
      fps: 10,
      schedule: scheduler.schedule,
      now: clock([0, 50, 120]),
    });

    await scheduler.step();
    await scheduler.step();
    await scheduler.step();

    expect(estimateHands).toHaveBeenCalledTimes(2);
    expect(tracking.channel.peek()?.timestamp).toBe(120);
    tracking.stop();
  });

  it("reports estimator failures and keeps going", async () => {
    const scheduler = new ManualScheduler();
    const boom = new Error("camera unplugged");
    const errors: TrackingError[] = [];
    const logger = { error: vi.fn() };
    const model: HandModel<string> = {
      estimateHands: async () => {
        throw boom;
      },
    };
    const tracking = startHandTracking({
      model,
      source: "camera",
      schedule: scheduler.schedule,
      now: clock([0]),
      onError: (error) => errors.push(error),
      logger,
    });

    await scheduler.step();

    expect(errors).toEqual([{ type: "estimate-failed", error: boom }]);
    expect(logger.error).toHaveBeenCalledWith("handtracking-tfjs frame failed", { type: "estimate-failed", error: boom });
    expect(scheduler.pending()).toBe(1);
    expect(tracking.isRunning()).toBe(true);
    tracking.stop();
  });

  it("reports malformed hands without publishing", async () => {
    const scheduler = new ManualScheduler();
    const errors: TrackingError[] = [];
    const broken: TrackedHand = { handIndex: 0, handedness: "Left", landmarks: fist().landmarks.slice(0, 3) };
    const tracking = startHandTracking({
      model: { estimateHands: async (_source: string) => [broken] },
      source: "camera",
      schedule: scheduler.schedule,
      now: clock([0]),
      onError: (error) => errors.push(error),
      logger: { error: vi.fn() },
    });

    await scheduler.step();

    expect(errors).toHaveLength(1);
    expect(errors[0].type).toBe("malformed-hand");
    expect(errors[0].error).toBeInstanceOf(MalformedHandError);
    expect(tracking.channel.take()).toBeNull();
    expect(scheduler.pending()).toBe(1);
    tracking.stop();
  });

  it("cancels the pending tick on stop", async () => {
    const scheduler = new ManualScheduler();
    const tracking = startHandTracking({
      model: new StubHandModel<string>(),
      source: "camera",
      schedule: scheduler.schedule,
      now: clock([0]),
    });

    await scheduler.step();
    expect(tracking.channel.take()?.commands).toEqual([]);
    expect(scheduler.pending()).toBe(1);

    tracking.stop();
    expect(scheduler.pending()).toBe(0);
    expect(tracking.isRunning()).toBe(false);
  });

  it("drops a frame whose estimate finishes after stop", async () => {
    const scheduler = new ManualScheduler();
    let release: (hands: TrackedHand[]) => void = () => undefined;
    const onSnapshot = vi.fn();
    const tracking = startHandTracking({
      model: {
        estimateHands: (_source: string) =>
          new Promise<TrackedHand[]>((resolve) => {
            release = resolve;
          }),
      },
      source: "camera",
      schedule: scheduler.schedule,
      now: clock([0]),
      onSnapshot,
    });

    await scheduler.step();
    tracking.stop();
    release([fist()]);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(onSnapshot).not.toHaveBeenCalled();
    expect(tracking.channel.peek()).toBeNull();
    expect(scheduler.pending()).toBe(0);
  });

  it("stops and logs when a snapshot handler throws", async () => {
    const scheduler = new ManualScheduler();
    const failure = new Error("renderer gone");
    const logger = { error: vi.fn() };
    const tracking = startHandTracking({
      model: new StubHandModel<string>(),
      source: "camera",
      schedule: scheduler.schedule,
      now: clock([0]),
      onSnapshot: () => {
        throw failure;
      },
      logger,
    });

    await scheduler.step();

    expect(tracking.isRunning()).toBe(false);
    expect(logger.error).toHaveBeenCalledWith("handtracking-tfjs loop stopped", failure);
    expect(scheduler.pending()).toBe(0);
  });
});
