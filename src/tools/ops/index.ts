/**
 * Ops Tool
 *
 * Exports the tool implementation and schema for co-located access
 */

export { opsTool, ping, serverStatus } from './tool';
export { opsToolSchema, type OpsToolParams } from './schema';
export type { OpsResult, PingResult, ServerStatusResult } from './tool';
