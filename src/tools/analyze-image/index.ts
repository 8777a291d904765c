/**
 * Analyze Image Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { analyzeImage, describeImage } from './tool';
export { analyzeImageSchema, type AnalyzeImageParams } from './schema';
