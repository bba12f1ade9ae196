/**
 * Color-heuristic analysis: share of vegetation, water/sky and earth-tone
 * pixels, used as a confidence boost and as a standalone fallback.
 */

import { ImageUnreadable } from './errors.js';
import { isReadableImage } from './image.js';
import type {
  ColorBoostConfig,
  ColorFallbackConfig,
  ColorProfile,
  DecodedImage,
} from './types.js';

// Earth-tone band, inclusive RGB bounds
const BROWN_MIN = [50, 25, 0] as const;
const BROWN_MAX = [150, 100, 50] as const;

function isBrown(r: number, g: number, b: number): boolean {
  return (
    r >= BROWN_MIN[0] && r <= BROWN_MAX[0] &&
    g >= BROWN_MIN[1] && g <= BROWN_MAX[1] &&
    b >= BROWN_MIN[2] && b <= BROWN_MAX[2]
  );
}

/**
 * Every pixel is classified as exactly one of brown, green-dominant,
 * blue-dominant or none, so the three ratios never sum past 1.
 */
export function analyzeColors(image: DecodedImage | undefined): ColorProfile {
  if (!isReadableImage(image)) {
    throw new ImageUnreadable();
  }

  const { data, channels } = image;
  const pixelCount = image.width * image.height;
  let green = 0;
  let blue = 0;
  let brown = 0;

  for (let i = 0; i < data.length; i += channels) {
    const r = data[i];
    const g = data[i + 1];
    const b = data[i + 2];

    if (isBrown(r, g, b)) {
      brown++;
    } else if (g > r && g > b) {
      green++;
    } else if (b > r && b > g) {
      blue++;
    }
  }

  return {
    greenRatio: green / pixelCount,
    blueRatio: blue / pixelCount,
    brownRatio: brown / pixelCount,
  };
}

/** Confidence points added to a successful classifier result. */
export function colorBoost(profile: ColorProfile, config: ColorBoostConfig): number {
  let boost = 0;
  if (profile.greenRatio > config.greenRatio) boost += config.amount;
  if (profile.blueRatio > config.blueRatio) boost += config.amount;
  return boost;
}

export interface ColorFallbackScore {
  environmentalScore: number;
  confidence: number;
  isEnvironmental: boolean;
  signals: string[];
}

export function colorFallbackScore(profile: ColorProfile, config: ColorFallbackConfig): ColorFallbackScore {
  let environmentalScore = 0;
  const signals: string[] = [];

  if (profile.greenRatio > config.green.ratio) {
    environmentalScore += config.green.score;
    signals.push('vegetation');
  }
  if (profile.blueRatio > config.blue.ratio) {
    environmentalScore += config.blue.score;
    signals.push('water');
  }
  if (profile.brownRatio > config.brown.ratio) {
    environmentalScore += config.brown.score;
    signals.push('earth');
  }

  // A weak color signal is still evidence, so never start from zero
  const confidence = Math.max(
    config.baseConfidence,
    Math.min(config.maxConfidence, Math.round(environmentalScore * 100))
  );

  return {
    environmentalScore,
    confidence,
    isEnvironmental: environmentalScore > config.environmentalThreshold,
    signals,
  };
}
