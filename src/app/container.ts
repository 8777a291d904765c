/**
 * Dependency Injection Container
 *
 * Provides typed dependency injection for all services with support for testing overrides.
 */

import type { Logger } from 'pino';
import { createLogger } from '../lib/logger';
import { createToolRegistry, type ToolRegistry } from '../mcp/tools/registry';
import { createAppConfig, type AppConfig } from '../config/app-config';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: AppConfig;
  logger: Logger;
  toolRegistry: ToolRegistry;
}

/**
 * Container environment presets
 */
export type ContainerEnvironment = 'default' | 'test';

/**
 * Configuration overrides for dependency creation
 */
export interface ContainerConfigOverrides {
  config?: AppConfig;
  environment?: ContainerEnvironment;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Deps>;

/**
 * Create application container with all dependencies
 */
export function createContainer(
  configOverrides: ContainerConfigOverrides = {},
  depsOverrides: DepsOverrides = {},
): Deps {
  const baseConfig = depsOverrides.config ?? configOverrides.config ?? createAppConfig();

  const appConfig: AppConfig =
    configOverrides.environment === 'test'
      ? { ...baseConfig, server: { ...baseConfig.server, logLevel: 'silent' } }
      : baseConfig;

  // Create logger first as other services depend on it
  const logger =
    depsOverrides.logger ??
    createLogger({
      name: appConfig.mcp.name,
      level: appConfig.server.logLevel,
      format: appConfig.logging.format,
    });

  const toolRegistry = depsOverrides.toolRegistry ?? createToolRegistry(logger);

  const deps: Deps = {
    config: appConfig,
    logger,
    toolRegistry,
  };

  logger.info(
    {
      config: {
        nodeEnv: appConfig.server.nodeEnv,
        logLevel: appConfig.server.logLevel,
        transport: appConfig.server.transport,
        sampleLimit: appConfig.analysis.sampleLimit,
        maxInputBytes: appConfig.analysis.maxInputBytes,
      },
      tools: toolRegistry.getToolNames(),
    },
    'Dependency container created',
  );

  return deps;
}

/**
 * Create container with test overrides for easy testing
 */
export function createTestContainer(overrides: DepsOverrides = {}): Deps {
  return createContainer({ config: createAppConfig({}), environment: 'test' }, overrides);
}

/**
 * Container status information
 */
export interface ContainerStatus {
  healthy: boolean;
  running: boolean;
  name: string;
  version: string;
  transport: string;
  tools: string[];
}

/**
 * Get comprehensive container status
 * This is the single source of truth for system status
 */
export function getContainerStatus(deps: Deps, serverRunning: boolean = false): ContainerStatus {
  const tools = deps.toolRegistry.getToolNames();

  return {
    healthy: tools.length > 0,
    running: serverRunning,
    name: deps.config.mcp.name,
    version: deps.config.mcp.version,
    transport: deps.config.server.transport,
    tools,
  };
}

/**
 * Release container resources and flush buffered log output
 */
export async function shutdownContainer(deps: Deps): Promise<void> {
  deps.logger.info('Shutting down container');
  await new Promise<void>((resolve) => {
    deps.logger.flush(() => resolve());
  });
}
