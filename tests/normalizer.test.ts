import { describe, it, expect } from 'vitest';
import { confidenceFloor, normalize } from '../src/normalizer.js';
import type { RawScore } from '../src/normalizer.js';
import { DEFAULT_ENGINE_CONFIG } from '../src/types.js';

const floors = DEFAULT_ENGINE_CONFIG.floors;

function raw(overrides: Partial<RawScore>): RawScore {
  return {
    riskLevel: 'low',
    rawConfidence: 0,
    source: 'classifier',
    isEnvironmental: true,
    matchedKeywords: [],
    analysis: 'test',
    ...overrides,
  };
}

describe('confidenceFloor', () => {
  it('follows the floor table', () => {
    expect(confidenceFloor('low', false, floors)).toBe(30);
    expect(confidenceFloor('low', true, floors)).toBe(40);
    expect(confidenceFloor('high', true, floors)).toBe(50);
    expect(confidenceFloor('critical', true, floors)).toBe(60);
  });

  it('keeps the tier floor for non-environmental high and critical results', () => {
    expect(confidenceFloor('high', false, floors)).toBe(50);
    expect(confidenceFloor('critical', false, floors)).toBe(60);
  });
});

describe('normalize', () => {
  it('lifts low confidence to the floor', () => {
    expect(normalize(raw({ rawConfidence: 10, isEnvironmental: false }), floors).confidence).toBe(30);
    expect(normalize(raw({ rawConfidence: 10, riskLevel: 'critical' }), floors).confidence).toBe(60);
  });

  it('rounds confidence above the floor', () => {
    expect(normalize(raw({ rawConfidence: 72.6 }), floors).confidence).toBe(73);
  });

  it('clamps to 100', () => {
    expect(normalize(raw({ rawConfidence: 130 }), floors).confidence).toBe(100);
  });

  it('treats a non-finite confidence as no evidence', () => {
    expect(normalize(raw({ rawConfidence: Number.NaN, riskLevel: 'high' }), floors).confidence).toBe(50);
  });

  it('copies the fields through and freezes the result', () => {
    const keywords = ['tree'];
    const result = normalize(
      raw({ rawConfidence: 55, source: 'color_heuristic', matchedKeywords: keywords, analysis: 'green' }),
      floors
    );

    keywords.push('oak');
    expect(result).toEqual({
      isEnvironmental: true,
      riskLevel: 'low',
      confidence: 55,
      matchedKeywords: ['tree'],
      source: 'color_heuristic',
      analysis: 'green',
    });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.matchedKeywords)).toBe(true);
  });
});
