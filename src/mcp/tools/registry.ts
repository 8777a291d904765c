/**
 * Unified Tool Registry - Simple Map-based registry for tools
 */

import type { z } from 'zod';
import type { Logger } from 'pino';
import { Failure, type Result } from '../../domain/types';
import { toErrorReport } from '../../lib/errors';
import type { ToolContext } from '../context/types';
import { analyzeImage, analyzeImageSchema } from '../../tools/analyze-image';
import { getImageOrientation, getImageOrientationSchema } from '../../tools/get-image-orientation';
import { countColors, countColorsSchema } from '../../tools/count-colors';
import { extractTextInfo, extractTextInfoSchema } from '../../tools/extract-text-info';
import { opsTool, opsToolSchema } from '../../tools/ops';

/**
 * Tool as the server sees it: parameters are validated inside `run`
 */
export interface ToolDefinition {
  name: string;
  description: string;
  shape: z.ZodRawShape;
  run(args: unknown, context: ToolContext): Promise<Result<unknown>>;
}

interface ToolSpec<P, R> {
  name: string;
  description: string;
  schema: z.ZodType<P, z.ZodTypeDef, unknown> & { shape: z.ZodRawShape };
  execute: (params: P, context: ToolContext) => Promise<Result<R>>;
}

/**
 * Wrap a typed tool function behind the untyped registry interface
 */
export function defineTool<P, R>(spec: ToolSpec<P, R>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    shape: spec.schema.shape,

    async run(args: unknown, context: ToolContext): Promise<Result<unknown>> {
      const parsed = spec.schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
        );
        return Failure({
          kind: 'InvalidInputError',
          message: `Invalid parameters: ${issues.join('; ')}`,
        });
      }

      try {
        return await spec.execute(parsed.data, context);
      } catch (error) {
        context.logger.error({ tool: spec.name, error }, 'Tool execution threw');
        return Failure(toErrorReport(error));
      }
    },
  };
}

/**
 * Tool definitions in registration order
 */
export function createToolDefinitions(): ToolDefinition[] {
  return [
    defineTool({
      name: 'analyze_image',
      description:
        'Analyze an image and return its dimensions, format, color mode, orientation, aspect ratio and a color summary',
      schema: analyzeImageSchema,
      execute: analyzeImage,
    }),
    defineTool({
      name: 'get_image_orientation',
      description: 'Determine whether an image is portrait, landscape or square',
      schema: getImageOrientationSchema,
      execute: getImageOrientation,
    }),
    defineTool({
      name: 'count_colors',
      description:
        'Count the unique colors in an image and list the dominant colors by frequency; large images are sampled',
      schema: countColorsSchema,
      execute: countColors,
    }),
    defineTool({
      name: 'extract_text_info',
      description:
        'Estimate whether an image contains text from contrast and edge density (heuristic, no OCR)',
      schema: extractTextInfoSchema,
      execute: extractTextInfo,
    }),
    defineTool({
      name: 'ops',
      description: 'Operational utilities: ping the server or report its status',
      schema: opsToolSchema,
      execute: opsTool,
    }),
  ];
}

/**
 * Registry interface - simple Map-based registry
 */
export interface ToolRegistry {
  tools: Map<string, ToolDefinition>;
  registerTool(tool: ToolDefinition): void;
  getTool(name: string): ToolDefinition | undefined;
  getAllTools(): ToolDefinition[];
  getToolNames(): string[];
}

/**
 * Create the tool registry, pre-populated with every image and ops tool
 */
export const createToolRegistry = (
  logger: Logger,
  definitions: ToolDefinition[] = createToolDefinitions(),
): ToolRegistry => {
  const tools = new Map<string, ToolDefinition>();

  const registry: ToolRegistry = {
    tools,

    registerTool(tool: ToolDefinition): void {
      if (tools.has(tool.name)) {
        logger.warn({ tool: tool.name }, 'Tool already registered, replacing');
      }
      tools.set(tool.name, tool);
      logger.debug({ tool: tool.name }, 'Tool registered');
    },

    getTool(name: string): ToolDefinition | undefined {
      return tools.get(name);
    },

    getAllTools(): ToolDefinition[] {
      return Array.from(tools.values());
    },

    getToolNames(): string[] {
      return Array.from(tools.keys());
    },
  };

  for (const definition of definitions) {
    registry.registerTool(definition);
  }

  return registry;
};
