import type { Vec3 } from "@handcad/session-core";
import { handOrientation, stablePalmCenter } from "./geometry";
import { add, column, identity, invert3, multiply, subtract, transpose } from "./internal/matrix";
import type { Matrix } from "./internal/matrix";
import { FINGERTIPS, assertLandmarkSet } from "./landmarks";
import { resolveOptions } from "./options";
import type { FilteredHand, FingertipIndex, GestureEngineOptions, Landmark } from "./types";

export interface FingertipFilterState {
  /** x, y, z, vx, vy, vz */
  state: number[];
  covariance: Matrix;
}

// Constant-velocity model with one frame as the time step.
const TRANSITION: Matrix = [
  [1, 0, 0, 1, 0, 0],
  [0, 1, 0, 0, 1, 0],
  [0, 0, 1, 0, 0, 1],
  [0, 0, 0, 1, 0, 0],
  [0, 0, 0, 0, 1, 0],
  [0, 0, 0, 0, 0, 1],
];
const TRANSITION_T = transpose(TRANSITION);

const OBSERVATION: Matrix = [
  [1, 0, 0, 0, 0, 0],
  [0, 1, 0, 0, 0, 0],
  [0, 0, 1, 0, 0, 0],
];
const OBSERVATION_T = transpose(OBSERVATION);

type NoiseModel = { processNoise: number; measurementNoise: number; initialCovariance: number };

class FingertipKalman {
  private x: Matrix;
  private P: Matrix;
  private readonly Q: Matrix;
  private readonly R: Matrix;

  constructor(first: Landmark, noise: NoiseModel) {
    this.x = column([first.x, first.y, first.z, 0, 0, 0]);
    this.P = identity(6, noise.initialCovariance);
    this.Q = identity(6, noise.processNoise);
    this.R = identity(3, noise.measurementNoise);
  }

  step(measurement: Landmark): Vec3 {
    // Predict.
    const xPred = multiply(TRANSITION, this.x);
    const pPred = add(multiply(multiply(TRANSITION, this.P), TRANSITION_T), this.Q);

    // Update.
    const innovation = subtract(column([measurement.x, measurement.y, measurement.z]), multiply(OBSERVATION, xPred));
    const S = add(multiply(multiply(OBSERVATION, pPred), OBSERVATION_T), this.R);
    const sInverse = invert3(S);
    if (!sInverse) {
      // R is positive definite, so S can only be singular once the state has gone non-finite.
      this.x = xPred;
      this.P = pPred;
      return this.position();
    }
    const gain = multiply(multiply(pPred, OBSERVATION_T), sInverse);
    this.x = add(xPred, multiply(gain, innovation));
    this.P = multiply(subtract(identity(6), multiply(gain, OBSERVATION)), pPred);
    return this.position();
  }

  position(): Vec3 {
    return [this.x[0][0], this.x[1][0], this.x[2][0]];
  }

  snapshot(): FingertipFilterState {
    return { state: this.x.map((row) => row[0]), covariance: this.P.map((row) => [...row]) };
  }
}

/**
 * Smooths the five fingertips of one tracked hand. Other landmarks pass through. One
 * instance per hand; call `reset` (or drop the instance) when the hand is lost so the
 * next observation starts fresh instead of blending two different hands.
 */
export class LandmarkFilter {
  private readonly noise: NoiseModel;
  private filters = new Map<FingertipIndex, FingertipKalman>();
  private previous: Landmark[] | null = null;

  constructor(opts?: GestureEngineOptions) {
    const { processNoise, measurementNoise, initialCovariance } = resolveOptions(opts);
    this.noise = { processNoise, measurementNoise, initialCovariance };
  }

  update(landmarks: Landmark[]): FilteredHand {
    assertLandmarkSet(landmarks);
    const filtered = landmarks.map((landmark) => ({ ...landmark }));

    for (const tip of FINGERTIPS) {
      const raw = landmarks[tip];
      const filter = this.filters.get(tip);
      if (!filter) {
        // First observation seeds the state and passes through.
        this.filters.set(tip, new FingertipKalman(raw, this.noise));
        continue;
      }
      const [x, y, z] = filter.step(raw);
      filtered[tip] = { x, y, z };
    }

    const velocities: FilteredHand["velocities"] = {};
    if (this.previous) {
      for (const tip of FINGERTIPS) {
        const current = filtered[tip];
        const last = this.previous[tip];
        velocities[tip] = [current.x - last.x, current.y - last.y, current.z - last.z];
      }
    }
    this.previous = filtered;

    return {
      landmarks: filtered,
      velocities,
      palmCenter: stablePalmCenter(filtered),
      orientation: handOrientation(filtered),
    };
  }

  reset(): void {
    this.filters.clear();
    this.previous = null;
  }

  getFingertipState(tip: FingertipIndex): FingertipFilterState | undefined {
    return this.filters.get(tip)?.snapshot();
  }
}
