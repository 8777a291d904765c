/**
 * Unit Tests: Extract Text Info Tool
 */

import { describe, it, expect } from '@jest/globals';
import { extractTextInfo } from '@tools/extract-text-info';
import { TEXT_ANALYSIS_NOTE } from '@lib/image/statistics';
import { createTestContext, unwrap, unwrapError } from '@test/utilities/test-context';
import {
  BLACK,
  NOT_AN_IMAGE,
  RED,
  WHITE,
  patternPng,
  solidPng,
  toBase64,
  truncatedPng,
} from '@test/fixtures/images';

describe('extractTextInfo', () => {
  it('should be inconclusive for a tiny image', async () => {
    const png = await solidPng(2, 3, RED);
    const report = unwrap(await extractTextInfo({ image: toBase64(png) }, createTestContext()));

    expect(report).toEqual({
      imageMode: 'RGB',
      grayscaleRange: { min: 76, max: 76 },
      contrast: 0,
      contrastLevel: 'low',
      edgeDensity: 0,
      likelihood: 'unknown',
      containsText: null,
      confidence: 0,
      assessment: 'Inconclusive: image is too small to assess',
      note: TEXT_ANALYSIS_NOTE,
    });
  });

  it('should find text likely in high-contrast stripes', async () => {
    const png = await patternPng(16, 16, (x) => (x % 8 < 4 ? BLACK : WHITE));
    const report = unwrap(await extractTextInfo({ image: toBase64(png) }, createTestContext()));

    expect(report.contrast).toBe(255);
    expect(report.contrastLevel).toBe('high');
    expect(report.edgeDensity).toBe(0.1);
    expect(report.likelihood).toBe('likely');
    expect(report.containsText).toBe(true);
  });

  it('should find text unlikely in a blank page', async () => {
    const png = await solidPng(32, 32, WHITE);
    const report = unwrap(await extractTextInfo({ image: toBase64(png) }, createTestContext()));

    expect(report.likelihood).toBe('unlikely');
    expect(report.containsText).toBe(false);
  });

  it('should fail with InvalidInputError for empty input', async () => {
    const result = await extractTextInfo({ image: '' }, createTestContext());
    expect(unwrapError(result).kind).toBe('InvalidInputError');
  });

  it('should fail with DecodeError for a truncated PNG', async () => {
    const result = await extractTextInfo(
      { image: toBase64(await truncatedPng()) },
      createTestContext(),
    );
    expect(unwrapError(result).kind).toBe('DecodeError');
  });

  it('should accept raw bytes', async () => {
    const png = await solidPng(32, 32, WHITE);
    const report = unwrap(await extractTextInfo({ image: png }, createTestContext()));

    expect(report.likelihood).toBe('unlikely');
  });

  it('should fail with DecodeError for undecodable bytes', async () => {
    const result = await extractTextInfo({ image: toBase64(NOT_AN_IMAGE) }, createTestContext());
    expect(unwrapError(result).kind).toBe('DecodeError');
  });
});
