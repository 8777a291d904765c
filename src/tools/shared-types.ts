/**
 * Shared schema pieces and types for the image tools
 */

import { z } from 'zod';
import type { ImageEncoding, ImageSource } from '../domain/types';

export type { ToolContext } from '../mcp/context/types';

/**
 * Image parameters as the tool functions take them. MCP clients send base64
 * text; library callers may pass raw bytes and declare the encoding.
 */
export interface ImageInput {
  image: ImageSource;
  encoding?: ImageEncoding;
}

/**
 * Tool parameters with the MCP string `image` widened to an ImageInput
 */
export type WithImageInput<P extends { image: string }> = Omit<P, 'image'> & ImageInput;

export const imageSchema = z
  .string()
  .describe('Image as base64 text, with or without a data URI prefix (data:image/png;base64,...)');
