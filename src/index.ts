/**
 * Main export file for library consumers
 * Provides the analysis tools, the MCP server and supporting types
 */

export { MCPServer, createMcpServer, STATUS_RESOURCE_URI } from './mcp/server';
export type { McpServerOptions } from './mcp/server';
export { MCPServer as default } from './mcp/server';

export { createContainer, createTestContainer, getContainerStatus } from './app/container';
export type { Deps, ContainerStatus } from './app/container';
export { createAppConfig } from './config/app-config';
export type { AppConfig, AnalysisConfig } from './config/app-config';
export { createToolRegistry, createToolDefinitions, defineTool } from './mcp/tools/registry';
export type { ToolDefinition, ToolRegistry } from './mcp/tools/registry';

export { analyzeImage } from './tools/analyze-image';
export { getImageOrientation } from './tools/get-image-orientation';
export { countColors } from './tools/count-colors';
export { extractTextInfo } from './tools/extract-text-info';
export { opsTool, ping, serverStatus } from './tools/ops';

export { loadImage, normalizeImageInput, decodeImage } from './lib/image';
export { ImageAnalysisError, InvalidInputError, DecodeError } from './lib/errors';

export type { ToolContext } from './mcp/context/types';
export * from './domain/types';
