/**
 * Tests for the submission pipeline
 * Images are generated in memory with sharp; nothing touches the network
 */

import { describe, it, expect, vi } from 'vitest';
import sharp from 'sharp';
import { ZodError } from 'zod';
import { InsufficientInput } from '../src/errors.js';
import { analyzeSubmission } from '../src/pipeline.js';
import { ENGINE_VERSION } from '../src/types.js';

async function pngBase64(color: { r: number; g: number; b: number }): Promise<string> {
  const png = await sharp({ create: { width: 16, height: 16, channels: 3, background: color } }).png().toBuffer();
  return png.toString('base64');
}

describe('analyzeSubmission', () => {
  it('scores a photo with upstream labels', async () => {
    const outcome = await analyzeSubmission({
      request_id: 'forest-1',
      title: 'Old growth stand',
      image_base64: await pngBase64({ r: 20, g: 160, b: 30 }),
      labels: [{ label: 'tree', score: 0.9 }],
    });

    expect(outcome).toEqual({
      version: ENGINE_VERSION,
      request_id: 'forest-1',
      result: {
        isEnvironmental: true,
        riskLevel: 'low',
        confidence: 42,
        matchedKeywords: ['tree'],
        source: 'classifier',
        analysis: 'Environmental content detected (low risk)',
      },
      status: 'mixed',
      alert: false,
    });
  });

  it('flags and alerts on a critical photo', async () => {
    const outcome = await analyzeSubmission({
      image_base64: await pngBase64({ r: 128, g: 128, b: 128 }),
      labels: [{ label: 'oil_spill', score: 0.8 }],
    });

    expect(outcome.result.riskLevel).toBe('critical');
    expect(outcome.status).toBe('flagged');
    expect(outcome.alert).toBe(true);
    expect(outcome.request_id).toBeNull();
  });

  it('falls back to text when the photo cannot be decoded', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const outcome = await analyzeSubmission(
      {
        request_id: 'broken-photo',
        title: 'Flood warning',
        image_base64: Buffer.from('not an image').toString('base64'),
      },
      { logger }
    );

    expect(outcome.result.source).toBe('keyword_fallback');
    expect(outcome.result.riskLevel).toBe('high');
    expect(outcome.status).toBe('flagged');
    expect(outcome.alert).toBe(true);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toBe('submission image unreadable');
  });

  it('is reproducible for a text-only submission with a request id', async () => {
    const submission = { request_id: 'text-7', title: 'Litter along the river', location: 'Riverside walk' };
    const first = await analyzeSubmission(submission);
    const second = await analyzeSubmission(submission);

    expect(second).toEqual(first);
    expect(first.result.source).toBe('keyword_fallback');
  });

  it('rejects an empty submission', async () => {
    await expect(analyzeSubmission({})).rejects.toBeInstanceOf(InsufficientInput);
  });

  it('validates the submission shape', async () => {
    await expect(
      analyzeSubmission({ title: 'x', labels: [{ label: 'tree', score: 2 }] })
    ).rejects.toBeInstanceOf(ZodError);
  });
});
