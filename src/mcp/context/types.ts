/**
 * ToolContext Types
 *
 * Context object handed to every tool implementation. It is created per
 * invocation and holds nothing that outlives the call.
 */

import type { Logger } from '../../lib/logger';
import type { AnalysisConfig } from '../../config/app-config';

/**
 * Identity of the serving MCP server, surfaced by the ops tool
 */
export interface ServerIdentity {
  name: string;
  version: string;
  transport: string;
  tools: readonly string[];
}

/**
 * Main context object passed to tools
 *
 * @example
 * ```typescript
 * export async function myTool(
 *   params: MyToolParams,
 *   context: ToolContext,
 * ): Promise<Result<MyToolResult>> {
 *   context.logger.info({ sampleLimit: context.analysis.sampleLimit }, 'Scanning pixels');
 *   return Success(result);
 * }
 * ```
 */
export interface ToolContext {
  /**
   * Logger for debugging and error tracking - Required for all tools.
   * Carries the tool name as a bound field when created by the server.
   */
  logger: Logger;

  /**
   * Analysis limits and defaults (sample limit, top-N, decode limits)
   */
  analysis: AnalysisConfig;

  /**
   * Set when the tool runs inside an MCP server
   */
  server?: ServerIdentity | undefined;
}
