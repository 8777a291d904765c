/**
 * Image decoder backed by sharp (libvips)
 *
 * Produces a request-local DecodedImage: metadata from the container plus
 * 8-bit sRGB pixels. Nothing is cached between calls.
 */

import sharp from 'sharp';
import { DecodeError } from '../errors';
import type { ColorMode, DecodedImage } from '../../domain/types';

// libvips keeps an operation cache by default; decoded images must not outlive their request
sharp.cache(false);

export interface DecodeOptions {
  /** Passed to sharp as limitInputPixels */
  maxInputPixels?: number;
  /** Wall-clock limit for decode + pixel extraction */
  timeoutSeconds?: number;
}

/**
 * Derive the source colour mode from sharp metadata
 */
export function resolveColorMode(metadata: sharp.Metadata): ColorMode {
  if (metadata.space === 'cmyk') {
    return 'CMYK';
  }
  if (metadata.format === 'gif' || metadata.isPalette) {
    return 'P';
  }

  switch (metadata.channels) {
    case 1:
      return 'L';
    case 2:
      return 'LA';
    case 4:
      return 'RGBA';
    default:
      return 'RGB';
  }
}

export function resolveFormat(metadata: sharp.Metadata): string {
  return metadata.format ? metadata.format.toUpperCase() : 'Unknown';
}

/**
 * Expand interleaved samples with 1-4 channels to 3-channel RGB
 */
export function toRgb(data: Uint8Array, channels: number): Uint8Array {
  if (channels === 3) {
    return data;
  }

  const pixelCount = Math.floor(data.length / channels);
  const rgb = new Uint8Array(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    const src = i * channels;
    const dst = i * 3;
    if (channels <= 2) {
      const gray = data[src];
      rgb[dst] = gray;
      rgb[dst + 1] = gray;
      rgb[dst + 2] = gray;
    } else {
      rgb[dst] = data[src];
      rgb[dst + 1] = data[src + 1];
      rgb[dst + 2] = data[src + 2];
    }
  }
  return rgb;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Decode image bytes
 *
 * @throws DecodeError when the bytes are not an image sharp can read
 */
export async function decodeImage(
  bytes: Buffer,
  options: DecodeOptions = {},
): Promise<DecodedImage> {
  const sharpOptions: sharp.SharpOptions = {};
  if (options.maxInputPixels !== undefined) {
    sharpOptions.limitInputPixels = options.maxInputPixels;
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(bytes, sharpOptions).metadata();
  } catch (error) {
    throw new DecodeError(
      `Unable to decode image: ${describe(error)}`,
      { size: bytes.length, stage: 'metadata' },
      error instanceof Error ? error : undefined,
    );
  }

  try {
    let pipeline = sharp(bytes, sharpOptions);
    if (options.timeoutSeconds !== undefined) {
      pipeline = pipeline.timeout({ seconds: options.timeoutSeconds });
    }

    const { data, info } = await pipeline
      .toColourspace('srgb')
      .removeAlpha()
      .raw({ depth: 'uchar' })
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      format: resolveFormat(metadata),
      mode: resolveColorMode(metadata),
      channels: metadata.channels ?? info.channels,
      pixels: toRgb(data, info.channels),
    };
  } catch (error) {
    throw new DecodeError(
      `Unable to decode image: ${describe(error)}`,
      { size: bytes.length, format: metadata.format, stage: 'pixels' },
      error instanceof Error ? error : undefined,
    );
  }
}
