import { describe, it, expect } from "vitest";
import * as fc from "fast-check";
import { clipFrame, isOutsideCanvas } from "./canvas-clipper.js";
import { DiagnosticsCollector } from "./diagnostics.js";
import { cloneFrame } from "./keypoint.js";
import type { Keypoint, PoseFrame } from "./types.js";

function frameWith(body: Keypoint[], width = 512, height = 512): PoseFrame {
  return { body, leftHand: null, rightHand: null, face: null, canvasWidth: width, canvasHeight: height };
}

describe("isOutsideCanvas", () => {
  it("uses a half-open [0, size) range on both axes", () => {
    expect(isOutsideCanvas({ x: 0, y: 0, confidence: 1 }, 512, 512)).toBe(false);
    expect(isOutsideCanvas({ x: 511.9, y: 511.9, confidence: 1 }, 512, 512)).toBe(false);
    expect(isOutsideCanvas({ x: 512, y: 10, confidence: 1 }, 512, 512)).toBe(true);
    expect(isOutsideCanvas({ x: 10, y: 512, confidence: 1 }, 512, 512)).toBe(true);
    expect(isOutsideCanvas({ x: -0.1, y: 10, confidence: 1 }, 512, 512)).toBe(true);
    expect(isOutsideCanvas({ x: 10, y: -0.1, confidence: 1 }, 512, 512)).toBe(true);
  });
});

describe("clipFrame", () => {
  it("zeroes an out-of-canvas keypoint on the export copy only", () => {
    const working = frameWith([
      { x: 600, y: 100, confidence: 0.8 },
      { x: 256, y: 256, confidence: 0.7 },
    ]);

    const exported = clipFrame(working);

    expect(exported.body![0]).toEqual({ x: 0, y: 0, confidence: 0 });
    expect(exported.body![1]).toEqual({ x: 256, y: 256, confidence: 0.7 });
    expect(working.body![0]).toEqual({ x: 600, y: 100, confidence: 0.8 });
  });

  it("clips against the frame's own canvas size", () => {
    const exported = clipFrame(frameWith([{ x: 600, y: 100, confidence: 0.8 }], 1024, 768));
    expect(exported.body![0]).toEqual({ x: 600, y: 100, confidence: 0.8 });
  });

  it("clips every group and records what it zeroed", () => {
    const frame: PoseFrame = {
      body: [{ x: 10, y: 10, confidence: 0.9 }],
      leftHand: [{ x: 10, y: -5, confidence: 0.9 }],
      rightHand: null,
      face: [{ x: 700, y: 10, confidence: 0.9 }],
      canvasWidth: 512,
      canvasHeight: 512,
    };
    const diagnostics = new DiagnosticsCollector();

    const exported = clipFrame(frame, diagnostics);

    expect(exported.leftHand![0]).toEqual({ x: 0, y: 0, confidence: 0 });
    expect(exported.face![0]).toEqual({ x: 0, y: 0, confidence: 0 });
    expect(exported.rightHand).toBeNull();
    expect(diagnostics.entries.map((d) => [d.code, d.group, d.index])).toEqual([
      ["clipped", "leftHand", 0],
      ["clipped", "face", 0],
    ]);
  });
});

describe("Property: clipping is idempotent and leaves its input untouched", () => {
  const arbitraryKeypoint = (): fc.Arbitrary<Keypoint> =>
    fc.oneof(
      fc.constant({ x: 0, y: 0, confidence: 0 }),
      fc.record({
        x: fc.double({ min: -200, max: 800, noNaN: true, noDefaultInfinity: true }),
        y: fc.double({ min: -200, max: 800, noNaN: true, noDefaultInfinity: true }),
        confidence: fc.double({ min: 0, max: 1, noNaN: true }),
      }),
    );

  const arbitraryFrame = (): fc.Arbitrary<PoseFrame> =>
    fc.record({
      body: fc.array(arbitraryKeypoint(), { minLength: 18, maxLength: 18 }),
      leftHand: fc.option(fc.array(arbitraryKeypoint(), { minLength: 21, maxLength: 21 }), { nil: null }),
      rightHand: fc.option(fc.array(arbitraryKeypoint(), { minLength: 21, maxLength: 21 }), { nil: null }),
      face: fc.option(fc.array(arbitraryKeypoint(), { minLength: 70, maxLength: 70 }), { nil: null }),
      canvasWidth: fc.integer({ min: 1, max: 1024 }),
      canvasHeight: fc.integer({ min: 1, max: 1024 }),
    });

  it("clip(clip(f)) equals clip(f)", () => {
    fc.assert(
      fc.property(arbitraryFrame(), (frame) => {
        const once = clipFrame(frame);
        expect(clipFrame(once)).toEqual(once);
      }),
      { numRuns: 100 },
    );
  });

  it("never mutates the frame it clips", () => {
    fc.assert(
      fc.property(arbitraryFrame(), (frame) => {
        const before = cloneFrame(frame);
        clipFrame(frame);
        expect(frame).toEqual(before);
      }),
      { numRuns: 100 },
    );
  });
});
