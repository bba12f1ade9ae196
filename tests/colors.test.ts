import { describe, it, expect } from 'vitest';
import { analyzeColors, colorBoost, colorFallbackScore } from '../src/colors.js';
import { ImageUnreadable } from '../src/errors.js';
import { DEFAULT_ENGINE_CONFIG } from '../src/types.js';
import { BLUE, BROWN, GRAY, GREEN, brokenImage, imageFromRuns, solidImage } from './fixtures.js';

const boostConfig = DEFAULT_ENGINE_CONFIG.colorBoost;
const fallbackConfig = DEFAULT_ENGINE_CONFIG.colorFallback;

describe('analyzeColors', () => {
  it('counts green-dominant pixels', () => {
    const profile = analyzeColors(
      imageFromRuns([
        { color: GREEN, count: 50 },
        { color: GRAY, count: 50 },
      ])
    );
    expect(profile).toEqual({ greenRatio: 0.5, blueRatio: 0, brownRatio: 0 });
  });

  it('classifies each pixel into at most one bucket', () => {
    const profile = analyzeColors(
      imageFromRuns([
        { color: GREEN, count: 30 },
        { color: BLUE, count: 40 },
        { color: BROWN, count: 20 },
        { color: GRAY, count: 10 },
      ])
    );
    expect(profile).toEqual({ greenRatio: 0.3, blueRatio: 0.4, brownRatio: 0.2 });
  });

  it('counts an earth tone as brown, not green', () => {
    // green channel leads red here but the pixel sits inside the brown band
    const profile = analyzeColors(solidImage([60, 90, 20], 4));
    expect(profile.brownRatio).toBe(1);
    expect(profile.greenRatio).toBe(0);
  });

  it('reads RGBA pixels', () => {
    const data = new Uint8Array([20, 160, 30, 255, 128, 128, 128, 255]);
    expect(analyzeColors({ width: 2, height: 1, channels: 4, data }).greenRatio).toBe(0.5);
  });

  it('throws ImageUnreadable for missing or malformed pixel data', () => {
    expect(() => analyzeColors(undefined)).toThrow(ImageUnreadable);
    expect(() => analyzeColors(brokenImage())).toThrow(ImageUnreadable);
    expect(() =>
      analyzeColors({ width: 1, height: 1, channels: 2, data: new Uint8Array(2) })
    ).toThrow(ImageUnreadable);
  });
});

describe('colorBoost', () => {
  it('adds 15 for strong vegetation', () => {
    expect(colorBoost({ greenRatio: 0.41, blueRatio: 0, brownRatio: 0 }, boostConfig)).toBe(15);
  });

  it('adds both boosts independently', () => {
    expect(colorBoost({ greenRatio: 0.45, blueRatio: 0.4, brownRatio: 0 }, boostConfig)).toBe(30);
  });

  it('requires the ratio to exceed the cutoff', () => {
    expect(colorBoost({ greenRatio: 0.4, blueRatio: 0.35, brownRatio: 0 }, boostConfig)).toBe(0);
  });
});

describe('colorFallbackScore', () => {
  it('sums every signal and caps confidence at 85', () => {
    const score = colorFallbackScore({ greenRatio: 0.35, blueRatio: 0.3, brownRatio: 0.2 }, fallbackConfig);
    expect(score.environmentalScore).toBeCloseTo(0.9, 10);
    expect(score.confidence).toBe(85);
    expect(score.isEnvironmental).toBe(true);
    expect(score.signals).toEqual(['vegetation', 'water', 'earth']);
  });

  it('starts confidence at 60 with no signal', () => {
    const score = colorFallbackScore({ greenRatio: 0, blueRatio: 0, brownRatio: 0 }, fallbackConfig);
    expect(score.environmentalScore).toBe(0);
    expect(score.confidence).toBe(60);
    expect(score.isEnvironmental).toBe(false);
    expect(score.signals).toEqual([]);
  });

  it('treats water alone as not quite environmental', () => {
    const score = colorFallbackScore({ greenRatio: 0.1, blueRatio: 0.5, brownRatio: 0 }, fallbackConfig);
    expect(score.environmentalScore).toBeCloseTo(0.3, 10);
    expect(score.isEnvironmental).toBe(false);
  });

  it('uses the combined score once it passes 60', () => {
    const score = colorFallbackScore({ greenRatio: 0.5, blueRatio: 0.3, brownRatio: 0 }, fallbackConfig);
    expect(score.confidence).toBe(70);
  });
});
