/**
 * Ops Tool
 *
 * Provides operational utilities like ping and server status
 */

import * as os from 'os';
import { createTimer } from '../../lib/logger';
import { Success, type Result } from '../../domain/types';
import type { ServerIdentity, ToolContext } from '../../mcp/context/types';
import type { OpsToolParams } from './schema';

const UNKNOWN_SERVER: ServerIdentity = {
  name: 'image-analysis-mcp',
  version: 'unknown',
  transport: 'none',
  tools: [],
};

interface PingConfig {
  message?: string | undefined;
}

export interface PingResult {
  success: boolean;
  message: string;
  timestamp: string;
  server: {
    name: string;
    version: string;
    uptime: number;
    pid: number;
  };
}

/**
 * Ping operation - test server connectivity
 */
export async function ping(config: PingConfig, context: ToolContext): Promise<Result<PingResult>> {
  const timer = createTimer(context.logger, 'ops-ping');
  const { message = 'ping' } = config;
  const server = context.server ?? UNKNOWN_SERVER;

  context.logger.info({ message }, 'Processing ping request');

  const result: PingResult = {
    success: true,
    message: `pong: ${message}`,
    timestamp: new Date().toISOString(),
    server: {
      name: server.name,
      version: server.version,
      uptime: process.uptime(),
      pid: process.pid,
    },
  };

  timer.end();
  return Success(result);
}

interface ServerStatusConfig {
  details?: boolean | undefined;
}

export interface ServerStatusResult {
  success: boolean;
  name: string;
  version: string;
  transport: string;
  uptime: number;
  memory: {
    rss: number;
    heapUsed: number;
    systemFree: number;
    systemTotal: number;
  };
  tools: {
    count: number;
    names: string[];
  };
  limits?: {
    sampleLimit: number;
    topColors: number;
    maxInputBytes: number;
    maxInputPixels: number;
    decodeTimeoutSeconds: number;
  };
  system?: {
    platform: string;
    release: string;
    node: string;
    cpus: number;
  };
}

/**
 * Get server status
 */
export async function serverStatus(
  config: ServerStatusConfig,
  context: ToolContext,
): Promise<Result<ServerStatusResult>> {
  const timer = createTimer(context.logger, 'ops-server-status');
  const { details = false } = config;
  const server = context.server ?? UNKNOWN_SERVER;

  context.logger.info({ details }, 'Server status requested');

  const memory = process.memoryUsage();
  const status: ServerStatusResult = {
    success: true,
    name: server.name,
    version: server.version,
    transport: server.transport,
    uptime: Math.floor(process.uptime()),
    memory: {
      rss: memory.rss,
      heapUsed: memory.heapUsed,
      systemFree: os.freemem(),
      systemTotal: os.totalmem(),
    },
    tools: {
      count: server.tools.length,
      names: [...server.tools],
    },
  };

  if (details) {
    status.limits = { ...context.analysis };
    status.system = {
      platform: os.platform(),
      release: os.release(),
      node: process.version,
      cpus: os.cpus().length,
    };
  }

  context.logger.info(
    { uptime: status.uptime, rss: status.memory.rss, tools: status.tools.count },
    'Server status compiled',
  );

  timer.end();
  return Success(status);
}

export type OpsResult = PingResult | ServerStatusResult;

/**
 * Main ops function that delegates to specific operations
 */
async function opsImpl(params: OpsToolParams, context: ToolContext): Promise<Result<OpsResult>> {
  switch (params.operation) {
    case 'ping':
      return ping({ message: params.message }, context);
    case 'status':
      return serverStatus({ details: params.details }, context);
  }
}

/**
 * Export the ops tool directly
 */
export const opsTool = opsImpl;
