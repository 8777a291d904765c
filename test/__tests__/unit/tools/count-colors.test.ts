/**
 * Unit Tests: Count Colors Tool
 */

import { describe, it, expect } from '@jest/globals';
import { countColors } from '@tools/count-colors';
import { createTestContext, unwrap, unwrapError } from '@test/utilities/test-context';
import { BLUE, RED, WHITE, patternPng, toBase64, truncatedPng } from '@test/fixtures/images';

describe('countColors', () => {
  it('should rank colors by frequency', async () => {
    // 8 red, 6 blue, 2 white
    const png = await patternPng(4, 4, (x, y) => {
      if (y < 2) return RED;
      return x < 3 ? BLUE : WHITE;
    });
    const report = unwrap(await countColors({ image: toBase64(png) }, createTestContext()));

    expect(report.uniqueColors).toBe(3);
    expect(report.approximate).toBe(false);
    expect(report.dominantColors).toEqual([
      { rgb: [255, 0, 0], hex: '#ff0000', count: 8, percentage: 50 },
      { rgb: [0, 0, 255], hex: '#0000ff', count: 6, percentage: 37.5 },
      { rgb: [255, 255, 255], hex: '#ffffff', count: 2, percentage: 12.5 },
    ]);
  });

  it('should honour the top parameter', async () => {
    const png = await patternPng(4, 4, (_x, y) => (y < 2 ? RED : BLUE));
    const report = unwrap(await countColors({ image: toBase64(png), top: 1 }, createTestContext()));

    expect(report.uniqueColors).toBe(2);
    expect(report.dominantColors.map((color) => color.hex)).toEqual(['#ff0000']);
  });

  it('should sample when the image exceeds the sample limit', async () => {
    const png = await patternPng(10, 10, () => RED);
    const report = unwrap(
      await countColors({ image: toBase64(png), sampleLimit: 30 }, createTestContext()),
    );

    expect(report.approximate).toBe(true);
    expect(report.totalPixels).toBe(100);
    expect(report.sampledPixels).toBe(15);
  });

  it('should default the sample limit from configuration', async () => {
    const context = createTestContext();
    context.analysis = { ...context.analysis, sampleLimit: 50 };
    const png = await patternPng(10, 10, () => RED);
    const report = unwrap(await countColors({ image: toBase64(png) }, context));

    // stride ceil(100 / 50) = 2 shares a factor with the width and becomes 3
    expect(report.sampledPixels).toBe(34);
    expect(report.approximate).toBe(true);
  });

  it('should keep first-seen order for an even split', async () => {
    const png = await patternPng(4, 4, (x, y) => ((x + y) % 2 === 0 ? BLUE : RED));
    const report = unwrap(await countColors({ image: toBase64(png) }, createTestContext()));

    expect(report.dominantColors).toEqual([
      { rgb: [0, 0, 255], hex: '#0000ff', count: 8, percentage: 50 },
      { rgb: [255, 0, 0], hex: '#ff0000', count: 8, percentage: 50 },
    ]);
  });

  it('should report both colors of alternating columns when sampling', async () => {
    const png = await patternPng(100, 100, (x) => (x % 2 === 0 ? RED : BLUE));
    const report = unwrap(
      await countColors({ image: toBase64(png), sampleLimit: 5000 }, createTestContext()),
    );

    expect(report.approximate).toBe(true);
    expect(report.uniqueColors).toBe(2);
    expect(report.dominantColors).toEqual([
      { rgb: [255, 0, 0], hex: '#ff0000', count: 1667, percentage: 50 },
      { rgb: [0, 0, 255], hex: '#0000ff', count: 1667, percentage: 50 },
    ]);
  });

  it('should accept raw PNG bytes', async () => {
    const png = await patternPng(4, 4, (_x, y) => (y < 2 ? RED : BLUE));
    const report = unwrap(await countColors({ image: png }, createTestContext()));

    expect(report.uniqueColors).toBe(2);
    expect(report.totalPixels).toBe(16);
  });

  it('should honour a declared encoding', async () => {
    const png = await patternPng(4, 4, () => WHITE);
    const context = createTestContext();

    const fromBase64Bytes = unwrap(
      await countColors({ image: Buffer.from(toBase64(png)), encoding: 'base64' }, context),
    );
    const fromLatin1Text = unwrap(
      await countColors({ image: png.toString('latin1'), encoding: 'binary' }, context),
    );

    expect(fromBase64Bytes.dominantColors).toEqual([
      { rgb: [255, 255, 255], hex: '#ffffff', count: 16, percentage: 100 },
    ]);
    expect(fromLatin1Text).toEqual(fromBase64Bytes);
  });

  it('should fail with DecodeError for a truncated PNG', async () => {
    const result = await countColors({ image: toBase64(await truncatedPng()) }, createTestContext());
    expect(unwrapError(result).kind).toBe('DecodeError');
  });

  it('should fail with InvalidInputError for empty input', async () => {
    const result = await countColors({ image: '' }, createTestContext());
    expect(unwrapError(result).kind).toBe('InvalidInputError');
  });
});
