/**
 * Shared test fixtures: in-memory images and deterministic random sources
 */

import type { RandomSource } from '../src/random.js';
import type { DecodedImage } from '../src/types.js';

export type Rgb = readonly [number, number, number];

export const GREEN: Rgb = [20, 160, 30];
export const BLUE: Rgb = [30, 60, 200];
export const BROWN: Rgb = [120, 80, 30];
export const GRAY: Rgb = [128, 128, 128];

/** Single-row RGB image built from runs of solid color. */
export function imageFromRuns(runs: readonly { color: Rgb; count: number }[]): DecodedImage {
  const width = runs.reduce((sum, run) => sum + run.count, 0);
  const data = new Uint8Array(width * 3);
  let offset = 0;
  for (const run of runs) {
    for (let i = 0; i < run.count; i++) {
      data.set(run.color, offset);
      offset += 3;
    }
  }
  return { width, height: 1, channels: 3, data };
}

export function solidImage(color: Rgb, pixels = 100): DecodedImage {
  return imageFromRuns([{ color, count: pixels }]);
}

/** Declared 10x10 RGB but carries no pixel data. */
export function brokenImage(): DecodedImage {
  return { width: 10, height: 10, channels: 3, data: new Uint8Array(0) };
}

/** Always returns the low end of the requested range. */
export const minRandom: RandomSource = { nextInt: min => min };

/** Always returns the high end of the requested range. */
export const maxRandom: RandomSource = { nextInt: (_min, max) => max };
