import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  FORWARD,
  IDENTITY_ROTATION,
  fingerDirection,
  fingerStates,
  handOrientation,
  isAllExtended,
  isFingerExtended,
  isThumbExtended,
  pinchDistance,
  pointingDirection,
  secondaryFingerDirection,
  stablePalmCenter,
} from "../src";
import type { Landmark } from "../src";
import { POSES, handLandmarks, pinchLandmarks, withPoint } from "./fixtures";

// Millesimal grid: keeps degenerate geometry exact instead of subnormal.
const coordinate = fc.integer({ min: 0, max: 1000 }).map((n) => n / 1000);
const landmarkArb = fc.record({ x: coordinate, y: coordinate, z: coordinate });
const handArb = fc.array(landmarkArb, { minLength: 21, maxLength: 21 });

describe("finger extension", () => {
  it("reads the thumb from the wrist-MCP-tip alignment", () => {
    expect(isThumbExtended(handLandmarks({ thumb: true }))).toBe(true);
    expect(isThumbExtended(handLandmarks({ thumb: false }))).toBe(false);
  });

  it("does not count a thumb whose segments have zero length", () => {
    const hand = withPoint(handLandmarks({ thumb: true }), 4, { x: 0.35, y: 0.8 });
    expect(isThumbExtended(hand)).toBe(false);
  });

  it("depends on the reference joint for a half-curled finger", () => {
    // Tip between the PIP (0.5) and MCP (0.6) rows.
    const hand = withPoint(handLandmarks(), 8, { y: 0.55 });
    expect(isFingerExtended(hand, "index", "pip")).toBe(false);
    expect(isFingerExtended(hand, "index", "mcp")).toBe(true);
  });

  it("reports every finger of an open palm", () => {
    expect(fingerStates(handLandmarks(POSES.openPalm), "pip")).toEqual({
      thumb: true,
      index: true,
      middle: true,
      ring: true,
      pinky: true,
    });
    expect(isAllExtended(handLandmarks(POSES.openPalm))).toBe(true);
    expect(isAllExtended(handLandmarks({ index: true, middle: true, ring: true, pinky: true }))).toBe(false);
  });
});

describe("distances", () => {
  it("measures the pinch in 3D", () => {
    expect(pinchDistance(pinchLandmarks())).toBeCloseTo(0.03);
    const lifted = withPoint(pinchLandmarks(), 8, { z: 0.04 });
    expect(pinchDistance(lifted)).toBeCloseTo(0.05);
  });

  it("averages the wrist and finger bases for the palm center", () => {
    const [x, y, z] = stablePalmCenter(handLandmarks(POSES.fist));
    expect(x).toBeCloseTo(3.1 / 6);
    expect(y).toBeCloseTo(4.15 / 6);
    expect(z).toBe(0);
  });

  it("ignores fingertip motion in the palm center", () => {
    expect(stablePalmCenter(handLandmarks(POSES.openPalm))).toEqual(stablePalmCenter(handLandmarks(POSES.fist)));
  });
});

describe("handOrientation", () => {
  it("builds the palm frame from the wrist, middle MCP and pinky MCP", () => {
    const [x, y, z, w] = handOrientation(handLandmarks());
    expect(x).toBeCloseTo(0);
    expect(y).toBeCloseTo(0);
    expect(z).toBeCloseTo(-Math.SQRT1_2);
    expect(w).toBeCloseTo(Math.SQRT1_2);
  });

  it("falls back to identity when the palm collapses", () => {
    const point: Landmark = { x: 0.5, y: 0.5, z: 0 };
    const collapsed = Array.from({ length: 21 }, () => ({ ...point }));
    expect(handOrientation(collapsed)).toEqual(IDENTITY_ROTATION);
  });

  it("falls back to identity when the palm vectors are colinear", () => {
    const colinear = withPoint(handLandmarks(), 17, { x: 0.5, y: 0.3 });
    expect(handOrientation(colinear)).toEqual(IDENTITY_ROTATION);
  });

  it("always returns a unit quaternion", () => {
    fc.assert(
      fc.property(handArb, (hand) => {
        const [x, y, z, w] = handOrientation(hand);
        return Math.abs(Math.hypot(x, y, z, w) - 1) < 1e-6;
      })
    );
  });
});

describe("finger directions", () => {
  it("points from PIP to tip", () => {
    const [x, y, z] = pointingDirection(handLandmarks(POSES.point));
    expect(x).toBeCloseTo(0);
    expect(y).toBeCloseTo(-1);
    expect(z).toBeCloseTo(0);
  });

  it("returns FORWARD when the tip sits on the PIP joint", () => {
    const hand = withPoint(handLandmarks(), 12, { x: 0.5, y: 0.5 });
    expect(fingerDirection(hand, "middle")).toEqual(FORWARD);
  });

  it("is always unit length", () => {
    fc.assert(
      fc.property(handArb, (hand) => Math.abs(Math.hypot(...pointingDirection(hand)) - 1) < 1e-9)
    );
  });
});

describe("idempotence", () => {
  const measure = (hand: Landmark[]) => ({
    thumb: isThumbExtended(hand),
    fingers: fingerStates(hand, "pip"),
    pinch: pinchDistance(hand),
    palm: stablePalmCenter(hand),
    orientation: handOrientation(hand),
    pointing: pointingDirection(hand),
    secondary: secondaryFingerDirection(hand),
  });

  it("gives bit-identical results on repeated calls and leaves the hand untouched", () => {
    fc.assert(
      fc.property(handArb, (hand) => {
        const before = structuredClone(hand);
        const first = measure(hand);
        const second = measure(hand);
        expect(second).toStrictEqual(first);
        expect(Object.is(second.pinch, first.pinch)).toBe(true);
        for (const key of ["palm", "orientation", "pointing", "secondary"] as const) {
          const again: readonly number[] = second[key];
          const once: readonly number[] = first[key];
          again.forEach((value, i) => expect(Object.is(value, once[i])).toBe(true));
        }
        expect(hand).toStrictEqual(before);
      })
    );
  });
});
