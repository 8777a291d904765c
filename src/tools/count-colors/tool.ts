/**
 * Color Counting Tool
 *
 * Counts unique colours and ranks the dominant ones. Images above the sample
 * limit are scanned at a uniform stride and the count is flagged approximate.
 *
 * @example
 * ```typescript
 * const result = await countColors({ image: base64Png, top: 5 }, context);
 * if (result.ok && result.value.approximate) {
 *   context.logger.debug({ sampled: result.value.sampledPixels }, 'Colour count is approximate');
 * }
 * ```
 */

import { createTimer } from '../../lib/logger';
import { loadImage, summarizeColors } from '../../lib/image';
import { Success, Failure, type Result } from '../../domain/types';
import type { ColorReport } from '../../domain/types';
import type { ToolContext } from '../../mcp/context/types';
import type { WithImageInput } from '../shared-types';
import type { CountColorsParams } from './schema';

async function countColorsImpl(
  params: WithImageInput<CountColorsParams>,
  context: ToolContext,
): Promise<Result<ColorReport>> {
  const { logger, analysis } = context;
  const { sampleLimit = analysis.sampleLimit, top = analysis.topColors } = params;
  const timer = createTimer(logger, 'count-colors', { sampleLimit, top });

  const loaded = await loadImage(params.image, analysis, params.encoding);
  if (!loaded.ok) {
    timer.error(loaded.error.message, { kind: loaded.error.kind });
    return Failure(loaded.error);
  }

  const report = summarizeColors(loaded.value, { sampleLimit, top });

  timer.end({
    uniqueColors: report.uniqueColors,
    sampledPixels: report.sampledPixels,
    approximate: report.approximate,
  });
  return Success(report);
}

export const countColors = countColorsImpl;
