/**
 * Image Orientation Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { getImageOrientation } from './tool';
export { getImageOrientationSchema, type GetImageOrientationParams } from './schema';
