/**
 * Image Analysis Tool
 *
 * Summarizes an image: dimensions, container format, colour mode, orientation,
 * aspect ratio and a colour summary.
 *
 * @example
 * ```typescript
 * const result = await analyzeImage({ image: base64Png }, context);
 *
 * if (result.ok) {
 *   const { dimensions, orientation } = result.value;
 *   context.logger.info({ dimensions, orientation }, 'Image analyzed');
 * }
 * ```
 */

import { createTimer } from '../../lib/logger';
import {
  aspectRatio,
  classifyOrientation,
  loadImage,
  summarizeColors,
} from '../../lib/image';
import { Success, Failure, type Result } from '../../domain/types';
import type { DecodedImage, ImageAnalysisReport } from '../../domain/types';
import type { AnalysisConfig } from '../../config/app-config';
import type { ToolContext } from '../../mcp/context/types';
import type { WithImageInput } from '../shared-types';
import type { AnalyzeImageParams } from './schema';

/**
 * Build the summary report for an already decoded image
 */
export function describeImage(image: DecodedImage, analysis: AnalysisConfig): ImageAnalysisReport {
  const { width, height, format, mode } = image;

  return {
    dimensions: { width, height },
    format,
    mode,
    orientation: classifyOrientation(width, height),
    aspectRatio: aspectRatio(width, height),
    colors: summarizeColors(image, { sampleLimit: analysis.sampleLimit, top: analysis.topColors }),
    fileInfo: `${width}x${height} ${format} image in ${mode} mode`,
  };
}

async function analyzeImageImpl(
  params: WithImageInput<AnalyzeImageParams>,
  context: ToolContext,
): Promise<Result<ImageAnalysisReport>> {
  const { logger, analysis } = context;
  const timer = createTimer(logger, 'analyze-image');

  const loaded = await loadImage(params.image, analysis, params.encoding);
  if (!loaded.ok) {
    timer.error(loaded.error.message, { kind: loaded.error.kind });
    return Failure(loaded.error);
  }

  const image = loaded.value;
  timer.checkpoint('decoded', { width: image.width, height: image.height, format: image.format });

  const report = describeImage(image, analysis);

  timer.end({ uniqueColors: report.colors.uniqueColors, approximate: report.colors.approximate });
  return Success(report);
}

/**
 * Analyze image tool
 */
export const analyzeImage = analyzeImageImpl;
