/**
 * MCP Server implementation using the Model Context Protocol SDK.
 * Exposes the image analysis tools and a status resource over stdio or SSE.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { AddressInfo } from 'net';
import { getContainerStatus, type Deps } from '../../app/container';
import type { TransportType } from '../../config/app-config';
import type { ServerIdentity, ToolContext } from '../context/types';
import { formatToolResponse } from '../tools/response-formatter';
import { createSseHost, type SseHost } from './sse';

export const STATUS_RESOURCE_URI = 'image-analysis://status';

export interface McpServerOptions {
  name?: string;
  version?: string;
  transport?: TransportType;
  isRunning?: () => boolean;
}

/**
 * Build an SDK server with every registered tool and the status resource.
 * One instance serves exactly one transport connection.
 */
export function createMcpServer(deps: Deps, options: McpServerOptions = {}): McpServer {
  const identity: ServerIdentity = {
    name: options.name ?? deps.config.mcp.name,
    version: options.version ?? deps.config.mcp.version,
    transport: options.transport ?? deps.config.server.transport,
    tools: deps.toolRegistry.getToolNames(),
  };
  const isRunning = options.isRunning ?? (() => true);

  const server = new McpServer(
    { name: identity.name, version: identity.version },
    {
      capabilities: {
        resources: {
          subscribe: false,
          listChanged: false,
        },
        tools: {
          listChanged: false,
        },
      },
    },
  );

  for (const tool of deps.toolRegistry.getAllTools()) {
    server.tool(tool.name, tool.description, tool.shape, async (args) => {
      const logger = deps.logger.child({ tool: tool.name });
      logger.info('Executing tool via McpServer handler');

      const context: ToolContext = {
        logger,
        analysis: deps.config.analysis,
        server: identity,
      };
      const result = await tool.run(args, context);

      if (!result.ok) {
        logger.warn({ error: result.error }, 'Tool returned an error');
      }
      return formatToolResponse(result);
    });
  }

  server.resource(
    'status',
    STATUS_RESOURCE_URI,
    {
      description: 'Current status of the image analysis server',
      mimeType: 'application/json',
    },
    async (uri) => {
      const status = getContainerStatus(deps, isRunning());
      return {
        contents: [
          {
            uri: uri.href,
            mimeType: 'application/json',
            text: JSON.stringify(status, null, 2),
          },
        ],
      };
    },
  );

  deps.logger.debug({ tools: identity.tools.length }, 'SDK-native handlers configured');
  return server;
}

/**
 * MCP Server class that owns the selected transport and its lifecycle.
 */
export class MCPServer {
  private readonly deps: Deps;
  private readonly options: McpServerOptions;
  private stdioServer: McpServer | undefined;
  private sseHost: SseHost | undefined;
  private address: AddressInfo | undefined;
  private isRunning: boolean = false;

  constructor(deps: Deps, options: McpServerOptions = {}) {
    this.deps = deps;
    this.options = options;
  }

  private get transport(): TransportType {
    return this.options.transport ?? this.deps.config.server.transport;
  }

  private buildServer(): McpServer {
    return createMcpServer(this.deps, {
      ...this.options,
      transport: this.transport,
      isRunning: () => this.isRunning,
    });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      this.deps.logger.warn('Server is already running');
      return;
    }

    try {
      this.deps.logger.info({ transport: this.transport }, 'Starting MCP server connection...');

      if (this.transport === 'sse') {
        const { host, port } = this.deps.config.server;
        this.sseHost = createSseHost({
          logger: this.deps.logger,
          createServer: () => this.buildServer(),
          maxInputBytes: this.deps.config.analysis.maxInputBytes,
        });
        this.address = await this.sseHost.listen(port, host);
      } else {
        this.stdioServer = this.buildServer();
        await this.stdioServer.connect(new StdioServerTransport());
      }
      this.isRunning = true;

      const status = getContainerStatus(this.deps, this.isRunning);
      this.deps.logger.info(
        {
          transport: this.transport,
          tools: status.tools.length,
          healthy: status.healthy,
          ...(this.address && { port: this.address.port }),
        },
        'MCP server started',
      );
    } catch (error) {
      this.deps.logger.error({ error }, 'Failed to start server');
      throw error;
    }
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      this.deps.logger.warn('Server is not running');
      return;
    }

    try {
      if (this.sseHost) {
        await this.sseHost.close();
        this.sseHost = undefined;
        this.address = undefined;
      }
      if (this.stdioServer) {
        await this.stdioServer.close();
        this.stdioServer = undefined;
      }
      this.isRunning = false;
      this.deps.logger.info('Server stopped');
    } catch (error) {
      this.deps.logger.error({ error }, 'Failed to stop server');
      throw error;
    }
  }

  /**
   * Bound address when serving over SSE
   */
  getAddress(): AddressInfo | undefined {
    return this.address;
  }

  /**
   * Get server status
   * Delegates to the container for single source of truth
   */
  getStatus(): { running: boolean; transport: TransportType; tools: number } {
    const status = getContainerStatus(this.deps, this.isRunning);
    return {
      running: status.running,
      transport: this.transport,
      tools: status.tools.length,
    };
  }

  /**
   * Get list of available tools with their descriptions
   */
  getTools(): Array<{ name: string; description: string }> {
    return this.deps.toolRegistry.getAllTools().map((tool) => ({
      name: tool.name,
      description: tool.description,
    }));
  }
}
