/**
 * Descriptive statistics over a decoded image.
 *
 * Every function here is pure: it reads the DecodedImage and returns a new report.
 */

import type {
  ColorReport,
  ContrastLevel,
  DecodedImage,
  DominantColor,
  Orientation,
  TextInfoReport,
  TextLikelihood,
} from '../../domain/types';

/**
 * Tunable thresholds for the text-likelihood heuristic
 */
export const TEXT_HEURISTICS = {
  MIN_PIXELS: 64,
  HIGH_CONTRAST: 200,
  MEDIUM_CONTRAST: 100,
  TEXT_CONTRAST: 150,
  EDGE_STEP: 64,
  MIN_EDGE_DENSITY: 0.02,
  MAX_EDGE_DENSITY: 0.6,
  MAX_CONFIDENCE: 0.95,
} as const;

export const TEXT_ANALYSIS_NOTE =
  'This is a basic heuristic analysis. For proper OCR, use specialized text extraction tools.';

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

export function classifyOrientation(width: number, height: number): Orientation {
  if (width > height) return 'landscape';
  if (width < height) return 'portrait';
  return 'square';
}

/**
 * width / height to two decimals; 0 for a zero-height image
 */
export function aspectRatio(width: number, height: number): number {
  return height > 0 ? round(width / height, 2) : 0;
}

export function toHex(r: number, g: number, b: number): string {
  return `#${[r, g, b].map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}

export interface ColorSummaryOptions {
  /** Maximum number of pixels to scan */
  sampleLimit: number;
  /** Length of the dominant colour list */
  top: number;
}

const gcd = (a: number, b: number): number => (b === 0 ? a : gcd(b, a % b));

/**
 * Raster stride that reads at most `sampleLimit` pixels. The stride shares no
 * factor with the width, so successive rows are read at shifted columns.
 */
export function colorSampleStride(width: number, height: number, sampleLimit: number): number {
  const totalPixels = width * height;
  if (totalPixels <= sampleLimit) return 1;

  let stride = Math.ceil(totalPixels / sampleLimit);
  while (gcd(stride, width) !== 1) stride++;
  return stride;
}

/**
 * Count distinct colours and rank the most frequent ones.
 *
 * Images larger than `sampleLimit` pixels are sampled at a uniform raster
 * stride (see `colorSampleStride`); the report is then marked approximate.
 * Ties in the ranking keep first-seen order.
 */
export function summarizeColors(image: DecodedImage, options: ColorSummaryOptions): ColorReport {
  const { pixels, width, height } = image;
  const totalPixels = width * height;
  const stride = colorSampleStride(width, height, options.sampleLimit);

  // Map iteration follows insertion order, i.e. first-seen raster order
  const counts = new Map<number, number>();
  let sampledPixels = 0;
  for (let p = 0; p < totalPixels; p += stride) {
    const offset = p * 3;
    const key = (pixels[offset] << 16) | (pixels[offset + 1] << 8) | pixels[offset + 2];
    counts.set(key, (counts.get(key) ?? 0) + 1);
    sampledPixels++;
  }

  // Array.prototype.sort is stable
  const ranked = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);

  const dominantColors: DominantColor[] = ranked.slice(0, options.top).map(([key, count]) => {
    const r = (key >> 16) & 0xff;
    const g = (key >> 8) & 0xff;
    const b = key & 0xff;
    return {
      rgb: [r, g, b],
      hex: toHex(r, g, b),
      count,
      percentage: sampledPixels > 0 ? round((count / sampledPixels) * 100, 1) : 0,
    };
  });

  return {
    uniqueColors: counts.size,
    approximate: stride > 1,
    totalPixels,
    sampledPixels,
    dominantColors,
  };
}

/**
 * 8-bit luma using ITU-R 601-2 weights, truncated
 */
export function luma(r: number, g: number, b: number): number {
  return Math.floor((r * 299 + g * 587 + b * 114) / 1000);
}

export function classifyContrast(contrast: number): ContrastLevel {
  if (contrast > TEXT_HEURISTICS.HIGH_CONTRAST) return 'high';
  if (contrast > TEXT_HEURISTICS.MEDIUM_CONTRAST) return 'medium';
  return 'low';
}

interface LumaStatistics {
  min: number;
  max: number;
  edgeDensity: number;
}

/**
 * Luma range and edge density over a grid of at most ~sampleLimit pixels.
 * Each grid pixel is compared with its immediate right and lower neighbours.
 */
export function measureLuma(image: DecodedImage, sampleLimit: number): LumaStatistics {
  const { pixels, width, height } = image;
  const totalPixels = width * height;
  if (totalPixels === 0) {
    return { min: 0, max: 0, edgeDensity: 0 };
  }

  const step = totalPixels > sampleLimit ? Math.ceil(Math.sqrt(totalPixels / sampleLimit)) : 1;

  const lumaAt = (x: number, y: number): number => {
    const offset = (y * width + x) * 3;
    return luma(pixels[offset], pixels[offset + 1], pixels[offset + 2]);
  };

  let min = 255;
  let max = 0;
  let pairs = 0;
  let edges = 0;

  for (let y = 0; y < height; y += step) {
    for (let x = 0; x < width; x += step) {
      const value = lumaAt(x, y);
      if (value < min) min = value;
      if (value > max) max = value;

      if (x + 1 < width) {
        pairs++;
        if (Math.abs(value - lumaAt(x + 1, y)) > TEXT_HEURISTICS.EDGE_STEP) edges++;
      }
      if (y + 1 < height) {
        pairs++;
        if (Math.abs(value - lumaAt(x, y + 1)) > TEXT_HEURISTICS.EDGE_STEP) edges++;
      }
    }
  }

  return { min, max, edgeDensity: pairs > 0 ? edges / pairs : 0 };
}

interface TextVerdict {
  likelihood: TextLikelihood;
  confidence: number;
  assessment: string;
}

function judgeText(totalPixels: number, contrast: number, edgeDensity: number): TextVerdict {
  const h = TEXT_HEURISTICS;

  if (totalPixels < h.MIN_PIXELS) {
    return {
      likelihood: 'unknown',
      confidence: 0,
      assessment: 'Inconclusive: image is too small to assess',
    };
  }
  if (contrast <= h.MEDIUM_CONTRAST) {
    return {
      likelihood: 'unlikely',
      confidence: round(1 - contrast / 200, 2),
      assessment: 'Unlikely to contain text',
    };
  }
  if (contrast <= h.TEXT_CONTRAST) {
    return {
      likelihood: 'unknown',
      confidence: 0,
      assessment: 'Inconclusive: may contain text',
    };
  }
  if (edgeDensity < h.MIN_EDGE_DENSITY) {
    return {
      likelihood: 'unlikely',
      confidence: round(0.5 + 0.5 * (1 - edgeDensity / h.MIN_EDGE_DENSITY), 2),
      assessment: 'Unlikely to contain text: high contrast but few edges',
    };
  }
  if (edgeDensity > h.MAX_EDGE_DENSITY) {
    return {
      likelihood: 'unknown',
      confidence: 0,
      assessment: 'Inconclusive: edge density suggests noise or photographic texture',
    };
  }
  return {
    likelihood: 'likely',
    confidence: round(Math.min(h.MAX_CONFIDENCE, 0.6 + edgeDensity), 2),
    assessment: 'Likely contains text',
  };
}

/**
 * Crude text-likelihood signal from contrast and edge density. Not OCR.
 */
export function assessTextLikelihood(image: DecodedImage, sampleLimit: number): TextInfoReport {
  const { min, max, edgeDensity } = measureLuma(image, sampleLimit);
  const contrast = max - min;
  const verdict = judgeText(image.width * image.height, contrast, edgeDensity);

  return {
    imageMode: image.mode,
    grayscaleRange: { min, max },
    contrast,
    contrastLevel: classifyContrast(contrast),
    edgeDensity: round(edgeDensity, 4),
    likelihood: verdict.likelihood,
    containsText: verdict.likelihood === 'unknown' ? null : verdict.likelihood === 'likely',
    confidence: verdict.confidence,
    assessment: verdict.assessment,
    note: TEXT_ANALYSIS_NOTE,
  };
}
