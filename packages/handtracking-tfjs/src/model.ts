import type { HandDetector } from "@tensorflow-models/hand-pose-detection";
import type { TrackedHand } from "@handcad/gesture-core";
import { mapDetectionsToTrackedHands } from "./mapDetections";

/** Anything that can turn a frame source into tracked hands. */
export interface HandModel<Source = HTMLVideoElement> {
  estimateHands(source: Source): Promise<TrackedHand[]>;
}

export interface TFJSHandModelOptions {
  modelType?: "lite" | "full";
  maxHands?: number;
  solutionPath?: string;
  flipHorizontal?: boolean;
  runtime?: Runtime;
}

type Runtime = "mediapipe" | "tfjs";

const DEFAULT_SOLUTION_PATH = "https://cdn.jsdelivr.net/npm/@mediapipe/hands@0.4.1675469240";

const detectorPromises: Record<Runtime, Promise<HandDetector> | null> = {
  mediapipe: null,
  tfjs: null,
};
let tfBackendReady: Promise<void> | null = null;

export class HandModelError extends Error {
  constructor(
    readonly runtime: Runtime,
    cause: unknown
  ) {
    super(`Hand estimation failed on the ${runtime} runtime`, { cause });
    this.name = "HandModelError";
  }
}

function errorName(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "name" in error && typeof error.name === "string") {
    return error.name;
  }
  return undefined;
}

function loadDetector(runtime: Runtime, options: TFJSHandModelOptions): Promise<HandDetector> {
  const pending = detectorPromises[runtime];
  if (pending) return pending;
  const created = (async () => {
    if (runtime === "tfjs") {
      await ensureTfjsBackend();
    }
    const handPoseDetection = await import("@tensorflow-models/hand-pose-detection");
    const { SupportedModels } = handPoseDetection;
    return handPoseDetection.createDetector(SupportedModels.MediaPipeHands, {
      runtime,
      modelType: options.modelType ?? "lite",
      maxHands: options.maxHands ?? 2,
      solutionPath: options.solutionPath ?? DEFAULT_SOLUTION_PATH,
    });
  })();
  detectorPromises[runtime] = created;
  return created;
}

async function ensureTfjsBackend(): Promise<void> {
  if (tfBackendReady) return tfBackendReady;
  tfBackendReady = (async () => {
    const tf = await import("@tensorflow/tfjs-core");
    await import("@tensorflow/tfjs-backend-webgl");
    try {
      if (tf.getBackend() !== "webgl") {
        await tf.setBackend("webgl");
      }
      await tf.ready();
    } catch (error) {
      console.error("handtracking-tfjs: WebGL backend unavailable, using CPU", error);
      await tf.setBackend("cpu");
      await tf.ready();
    }
  })();
  return tfBackendReady;
}

class TFJSHandModel implements HandModel<HTMLVideoElement> {
  private currentRuntime: Runtime;
  private readonly allowFallback: boolean;

  constructor(private readonly options: TFJSHandModelOptions = {}) {
    this.currentRuntime = options.runtime ?? "mediapipe";
    this.allowFallback = !options.runtime;
  }

  async estimateHands(video: HTMLVideoElement): Promise<TrackedHand[]> {
    if (!video.videoWidth || !video.videoHeight) {
      return [];
    }
    const runtime = this.currentRuntime;
    try {
      const detector = await loadDetector(runtime, {
        modelType: this.options.modelType ?? (runtime === "tfjs" ? "full" : "lite"),
        maxHands: this.options.maxHands,
        solutionPath: this.options.solutionPath,
      });
      const predictions = await detector.estimateHands(video, { flipHorizontal: !!this.options.flipHorizontal });
      return mapDetectionsToTrackedHands(predictions, video);
    } catch (error) {
      // AbortError happens when play() is interrupted; skip the frame.
      if (errorName(error) === "AbortError") return [];
      // Next frame re-creates the detector, on the tfjs runtime if mediapipe was never pinned.
      detectorPromises[runtime] = null;
      if (this.allowFallback && runtime === "mediapipe") {
        this.currentRuntime = "tfjs";
      }
      throw new HandModelError(runtime, error);
    }
  }
}

export async function createTFJSHandModel(options?: TFJSHandModelOptions): Promise<HandModel<HTMLVideoElement>> {
  return new TFJSHandModel(options);
}

/** Sees no hands. For environments without TF.js support. */
export class StubHandModel<Source = HTMLVideoElement> implements HandModel<Source> {
  async estimateHands(_source: Source): Promise<TrackedHand[]> {
    return [];
  }
}
