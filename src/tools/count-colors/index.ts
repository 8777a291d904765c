/**
 * Count Colors Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { countColors } from './tool';
export { countColorsSchema, type CountColorsParams } from './schema';
