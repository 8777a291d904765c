/**
 * Image input adapter
 *
 * Every tool normalizes its input here before decoding: base64 text (with or
 * without a data URI prefix) and raw bytes both come out as a Buffer.
 */

import { ErrorCodes, InvalidInputError } from '../errors';
import type { ImageEncoding, ImageSource } from '../../domain/types';

const DATA_URI_PATTERN = /^data:([^,]*?),(.*)$/s;
const BASE64_PATTERN = /^[A-Za-z0-9+/\-_]*={0,2}$/;

export interface NormalizeOptions {
  /** Declared encoding; strings default to base64, bytes to binary */
  encoding?: ImageEncoding;
  /** Reject inputs whose decoded size exceeds this many bytes */
  maxBytes?: number;
}

/**
 * Strip a `data:` URI prefix, returning the base64 payload
 */
function stripDataUri(text: string): string {
  const match = DATA_URI_PATTERN.exec(text);
  if (!match) {
    return text;
  }

  const [, header = '', payload = ''] = match;
  if (!header.split(';').includes('base64')) {
    throw new InvalidInputError(
      'Unsupported data URI encoding: only base64 data URIs are accepted',
      ErrorCodes.UNSUPPORTED_ENCODING,
      { header },
    );
  }
  return payload;
}

/**
 * Decode base64 (standard or URL-safe alphabet, whitespace ignored)
 */
export function decodeBase64Image(text: string): Buffer {
  const payload = stripDataUri(text.trim()).replace(/\s+/g, '');

  if (payload.length === 0) {
    throw new InvalidInputError('No image provided', ErrorCodes.EMPTY_INPUT);
  }

  if (!BASE64_PATTERN.test(payload) || payload.length % 4 === 1) {
    throw new InvalidInputError(
      'Image data is not valid base64',
      ErrorCodes.UNSUPPORTED_ENCODING,
      { length: payload.length },
    );
  }

  const standard = payload.replace(/-/g, '+').replace(/_/g, '/');
  return Buffer.from(standard, 'base64');
}

/**
 * Normalize an ImageSource to raw bytes
 *
 * @throws InvalidInputError when the input is empty, not a recognized encoding, or too large
 */
export function normalizeImageInput(source: ImageSource, options: NormalizeOptions = {}): Buffer {
  const encoding: ImageEncoding =
    options.encoding ?? (typeof source === 'string' ? 'base64' : 'binary');

  let bytes: Buffer;
  if (typeof source === 'string') {
    bytes = encoding === 'base64' ? decodeBase64Image(source) : Buffer.from(source, 'latin1');
  } else if (encoding === 'base64') {
    bytes = decodeBase64Image(Buffer.from(source).toString('ascii'));
  } else {
    bytes = Buffer.from(source);
  }

  if (bytes.length === 0) {
    throw new InvalidInputError('No image provided', ErrorCodes.EMPTY_INPUT);
  }

  if (options.maxBytes !== undefined && bytes.length > options.maxBytes) {
    throw new InvalidInputError(
      `Image is ${bytes.length} bytes, which exceeds the ${options.maxBytes} byte limit`,
      ErrorCodes.INPUT_TOO_LARGE,
      { size: bytes.length, limit: options.maxBytes },
    );
  }

  return bytes;
}
