#!/usr/bin/env node
/**
 * Image Analysis MCP CLI
 * Command-line interface for the Image Analysis MCP Server
 */

import { Command, InvalidArgumentError } from 'commander';
import { exit, argv, env } from 'process';
import { MCPServer } from '../mcp/server';
import { createContainer, getContainerStatus, shutdownContainer, type Deps } from '../app/container';
import { createAppConfig, type AppConfig } from '../config/app-config';
import { createLogger, type Logger } from '../lib/logger';
import { isImageAnalysisError } from '../lib/errors';
import { analyzeFile } from './analyze-file';

const SHUTDOWN_TIMEOUT_MS = 10_000;

export interface StartOptions {
  transport?: string;
  port?: number;
  host?: string;
  logLevel?: string;
  dev?: boolean;
  validate?: boolean;
  listTools?: boolean;
}

/**
 * CLI logger honouring the configured level and format
 */
export function createCliLogger(config: AppConfig): Logger {
  return createLogger({
    name: `${config.mcp.name}:cli`,
    level: config.server.logLevel,
    format: config.logging.format,
  });
}

let logger: Logger | null = null;
function getLogger(): Logger {
  if (logger) return logger;
  try {
    logger = createCliLogger(createAppConfig(env));
  } catch (error) {
    logger = createLogger({ name: 'image-analysis-mcp:cli' });
    logger.warn({ error }, 'Invalid logging configuration, using defaults');
  }
  return logger;
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * Fold CLI flags into the environment the configuration is read from
 */
export function applyStartOptions(
  options: StartOptions,
  baseEnv: NodeJS.ProcessEnv = env,
): NodeJS.ProcessEnv {
  const next: NodeJS.ProcessEnv = { ...baseEnv };
  if (options.dev) {
    next.NODE_ENV = 'development';
    next.LOG_LEVEL = 'debug';
    next.LOG_FORMAT = 'pretty';
  }
  if (options.logLevel) next.LOG_LEVEL = options.logLevel;
  if (options.transport) next.MCP_TRANSPORT = options.transport;
  if (options.port !== undefined) next.PORT = String(options.port);
  if (options.host) next.HOST = options.host;
  return next;
}

function printConfiguration(config: AppConfig): void {
  console.error('🔍 Validating Image Analysis MCP configuration...\n');
  console.error('📋 Configuration Summary:');
  console.error(`  • Name: ${config.mcp.name} v${config.mcp.version}`);
  console.error(`  • Environment: ${config.server.nodeEnv}`);
  console.error(`  • Log Level: ${config.server.logLevel} (${config.logging.format})`);
  console.error(`  • Transport: ${config.server.transport}`);
  if (config.server.transport === 'sse') {
    console.error(`  • Listen: ${config.server.host}:${config.server.port}`);
  }
  console.error(`  • Sample Limit: ${config.analysis.sampleLimit} pixels`);
  console.error(`  • Top Colors: ${config.analysis.topColors}`);
  console.error(`  • Max Input: ${config.analysis.maxInputBytes} bytes`);
  console.error(`  • Max Pixels: ${config.analysis.maxInputPixels}`);
  console.error(`  • Decode Timeout: ${config.analysis.decodeTimeoutSeconds}s`);
  console.error('\n✅ Configuration validation complete!');
}

function printTools(server: MCPServer, deps: Deps): void {
  console.error('\n🛠️  Available MCP Tools:');
  console.error('═'.repeat(60));
  for (const tool of server.getTools()) {
    console.error(`  • ${tool.name.padEnd(24)} - ${tool.description}`);
  }
  const status = getContainerStatus(deps);
  console.error('\n📊 Summary:');
  console.error(`  • Total tools: ${status.tools.length}`);
}

function describeStartupFailure(error: unknown, options: StartOptions): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\n🔍 Error: ${message}`);

  if (isImageAnalysisError(error) && error.code === 'CONFIGURATION_INVALID') {
    console.error('\n💡 Configuration issue:');
    console.error('  • Check the IMAGE_*, PORT and LOG_* environment variables');
    console.error('  • Validate configuration: image-analysis-mcp --validate');
  }

  if (message.includes('EADDRINUSE')) {
    console.error('\n💡 Port conflict detected:');
    console.error(`  • Port ${options.port ?? env.PORT ?? 'configured'} is already in use`);
    console.error('  • Try a different port: --port <number>');
  }

  if (options.dev && error instanceof Error && error.stack) {
    console.error(`\n📍 Stack trace (dev mode):`);
    console.error(error.stack);
  } else if (!options.dev) {
    console.error('\n💡 For detailed error information, use --dev flag');
  }
}

async function runStart(options: StartOptions): Promise<void> {
  try {
    const config = createAppConfig(applyStartOptions(options));
    logger = createCliLogger(config);

    if (options.validate) {
      printConfiguration(config);
      getLogger().info('Configuration validation completed');
      exit(0);
    }

    const deps = createContainer({ config });
    const server = new MCPServer(deps);

    if (options.listTools) {
      printTools(server, deps);
      exit(0);
    }

    deps.logger.info(
      {
        config: {
          logLevel: config.server.logLevel,
          transport: config.server.transport,
          devMode: options.dev ?? false,
        },
      },
      'Starting Image Analysis MCP Server',
    );

    await server.start();

    if (config.server.transport === 'sse') {
      const address = server.getAddress();
      const port = address?.port ?? config.server.port;
      console.error(`📡 Listening on http://${config.server.host}:${port}/sse`);
    } else {
      console.error('📡 Ready to accept MCP requests via stdio');
    }

    const shutdown = async (signal: string): Promise<void> => {
      deps.logger.info({ signal }, 'Shutdown initiated');

      const shutdownTimeout = setTimeout(() => {
        deps.logger.error('Forced shutdown due to timeout');
        exit(1);
      }, SHUTDOWN_TIMEOUT_MS);

      try {
        await server.stop();
        await shutdownContainer(deps);
        clearTimeout(shutdownTimeout);
        exit(0);
      } catch (error) {
        clearTimeout(shutdownTimeout);
        deps.logger.error({ error }, 'Shutdown error');
        exit(1);
      }
    };

    process.on('SIGTERM', () => {
      shutdown('SIGTERM').catch((error: unknown) => {
        getLogger().error({ error }, 'Error during SIGTERM shutdown');
        exit(1);
      });
    });

    process.on('SIGINT', () => {
      shutdown('SIGINT').catch((error: unknown) => {
        getLogger().error({ error }, 'Error during SIGINT shutdown');
        exit(1);
      });
    });
  } catch (error) {
    getLogger().error({ error }, 'Server startup failed');
    console.error('❌ Server startup failed');
    describeStartupFailure(error, options);
    exit(1);
  }
}

async function runAnalyze(file: string): Promise<void> {
  const config = createAppConfig();
  logger = createCliLogger(config);
  const deps = createContainer({ config });
  const { report, failed } = await analyzeFile(file, deps);
  console.log(JSON.stringify(report, null, 2));
  exit(failed ? 1 : 0);
}

function buildProgram(version: string): Command {
  const program = new Command();

  program
    .name('image-analysis-mcp')
    .description('MCP server exposing image inspection tools')
    .version(version);

  program
    .command('start', { isDefault: true })
    .description('start the MCP server')
    .option('--transport <transport>', 'transport: stdio or sse (default: stdio)')
    .option('--port <port>', 'port for the SSE transport (default: 7860)', parsePort)
    .option('--host <host>', 'host for the SSE transport (default: 127.0.0.1)')
    .option('--log-level <level>', 'logging level: trace, debug, info, warn, error')
    .option('--dev', 'enable development mode with debug logging')
    .option('--validate', 'validate configuration and exit')
    .option('--list-tools', 'list all registered MCP tools and exit')
    .action((options: StartOptions) => runStart(options));

  program
    .command('analyze')
    .description('analyze a local image file and print the combined report')
    .argument('<file>', 'path to an image file')
    .action((file: string) => runAnalyze(file));

  program.addHelpText(
    'after',
    `

Examples:
  $ image-analysis-mcp                          Start server with stdio transport
  $ image-analysis-mcp --transport sse          Serve MCP over SSE on 127.0.0.1:7860
  $ image-analysis-mcp --list-tools             Show all available MCP tools
  $ image-analysis-mcp analyze ./photo.png      Print a one-shot analysis

Environment Variables:
  LOG_LEVEL, LOG_FORMAT      Logging level and format (json, pretty)
  MCP_TRANSPORT, HOST, PORT  Transport selection and SSE listen address
  IMAGE_SAMPLE_LIMIT         Pixels scanned per analysis before sampling
  IMAGE_TOP_COLORS           Dominant colors reported by default
  IMAGE_MAX_BYTES            Largest accepted decoded image
`,
  );

  return program;
}

if (require.main === module) {
  process.on('uncaughtException', (error) => {
    getLogger().fatal({ error }, 'Uncaught exception in CLI');
    exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    getLogger().fatal({ reason }, 'Unhandled rejection in CLI');
    exit(1);
  });

  const version = createAppConfig({}).mcp.version;
  buildProgram(version)
    .parseAsync(argv)
    .catch((error: unknown) => {
      getLogger().error({ error }, 'CLI failed');
      exit(1);
    });
}
