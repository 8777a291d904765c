/**
 * Image domain types shared by the decoder, the statistics helpers and the tools.
 */

/**
 * Raw image input: base64 text (optionally a data URI) or raw bytes
 */
export type ImageSource = string | Uint8Array;

/**
 * Declared encoding of an ImageSource. Strings default to base64, bytes to binary.
 */
export type ImageEncoding = 'base64' | 'binary';

/**
 * Colour mode of the source image, named the way imaging libraries usually report it
 */
export type ColorMode = 'L' | 'LA' | 'P' | 'RGB' | 'RGBA' | 'CMYK';

export type Orientation = 'portrait' | 'landscape' | 'square';

/**
 * Decoded image owned by a single analysis call.
 *
 * `pixels` always holds 8-bit interleaved sRGB samples (3 per pixel) regardless
 * of `mode`, which describes the source image.
 */
export interface DecodedImage {
  readonly width: number;
  readonly height: number;
  readonly format: string;
  readonly mode: ColorMode;
  /** Channel count of the source image */
  readonly channels: number;
  readonly pixels: Uint8Array;
}

export type RgbTuple = [number, number, number];

export interface DominantColor {
  rgb: RgbTuple;
  hex: string;
  count: number;
  percentage: number;
}

export interface ColorReport {
  uniqueColors: number;
  approximate: boolean;
  totalPixels: number;
  sampledPixels: number;
  dominantColors: DominantColor[];
}

export interface OrientationReport {
  orientation: Orientation;
  width: number;
  height: number;
}

export type ContrastLevel = 'high' | 'medium' | 'low';

export type TextLikelihood = 'likely' | 'unlikely' | 'unknown';

export interface TextInfoReport {
  imageMode: ColorMode;
  grayscaleRange: { min: number; max: number };
  contrast: number;
  contrastLevel: ContrastLevel;
  edgeDensity: number;
  likelihood: TextLikelihood;
  containsText: boolean | null;
  confidence: number;
  assessment: string;
  note: string;
}

export interface ImageAnalysisReport {
  dimensions: { width: number; height: number };
  format: string;
  mode: ColorMode;
  orientation: Orientation;
  aspectRatio: number;
  colors: ColorReport;
  fileInfo: string;
}
