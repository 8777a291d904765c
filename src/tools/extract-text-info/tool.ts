/**
 * Text Likelihood Tool
 *
 * Estimates whether an image contains text from luma contrast and edge
 * density. This is a heuristic and performs no OCR; inconclusive images
 * report `likelihood: 'unknown'`.
 */

import { createTimer } from '../../lib/logger';
import { assessTextLikelihood, loadImage } from '../../lib/image';
import { Success, Failure, type Result } from '../../domain/types';
import type { TextInfoReport } from '../../domain/types';
import type { ToolContext } from '../../mcp/context/types';
import type { WithImageInput } from '../shared-types';
import type { ExtractTextInfoParams } from './schema';

async function extractTextInfoImpl(
  params: WithImageInput<ExtractTextInfoParams>,
  context: ToolContext,
): Promise<Result<TextInfoReport>> {
  const { logger, analysis } = context;
  const timer = createTimer(logger, 'extract-text-info');

  const loaded = await loadImage(params.image, analysis, params.encoding);
  if (!loaded.ok) {
    timer.error(loaded.error.message, { kind: loaded.error.kind });
    return Failure(loaded.error);
  }

  const report = assessTextLikelihood(loaded.value, analysis.sampleLimit);

  timer.end({
    likelihood: report.likelihood,
    contrast: report.contrast,
    edgeDensity: report.edgeDensity,
  });
  return Success(report);
}

export const extractTextInfo = extractTextInfoImpl;
