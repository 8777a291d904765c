/**
 * Image loading entry point: input adapter + decoder behind a Result
 */

import { normalizeImageInput } from './input';
import { decodeImage } from './decoder';
import { executeAsResult } from '../errors';
import type { Result } from '../../domain/types';
import type { DecodedImage, ImageEncoding, ImageSource } from '../../domain/types';
import type { AnalysisConfig } from '../../config/app-config';

export { normalizeImageInput, decodeBase64Image } from './input';
export type { NormalizeOptions } from './input';
export { decodeImage, resolveColorMode, resolveFormat, toRgb } from './decoder';
export type { DecodeOptions } from './decoder';
export {
  classifyOrientation,
  aspectRatio,
  summarizeColors,
  colorSampleStride,
  assessTextLikelihood,
  measureLuma,
  luma,
  toHex,
  TEXT_HEURISTICS,
} from './statistics';

export type LoadLimits = Pick<
  AnalysisConfig,
  'maxInputBytes' | 'maxInputPixels' | 'decodeTimeoutSeconds'
>;

/**
 * Normalize and decode an image in one pass
 */
export async function loadImage(
  source: ImageSource,
  limits: LoadLimits,
  encoding?: ImageEncoding,
): Promise<Result<DecodedImage>> {
  return executeAsResult(async () => {
    const bytes = normalizeImageInput(source, {
      maxBytes: limits.maxInputBytes,
      ...(encoding !== undefined && { encoding }),
    });
    return decodeImage(bytes, {
      maxInputPixels: limits.maxInputPixels,
      timeoutSeconds: limits.decodeTimeoutSeconds,
    });
  });
}
