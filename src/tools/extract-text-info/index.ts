/**
 * Extract Text Info Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { extractTextInfo } from './tool';
export { extractTextInfoSchema, type ExtractTextInfoParams } from './schema';
