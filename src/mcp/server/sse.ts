/**
 * HTTP/SSE transport host
 *
 * Each `GET /sse` connection gets its own McpServer bound to an
 * SSEServerTransport; clients post JSON-RPC messages back to
 * `POST /messages?sessionId=<id>`.
 */

import type { Server as HttpServer } from 'http';
import type { AddressInfo } from 'net';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import type { Logger } from 'pino';

export const SSE_PATH = '/sse';
export const MESSAGES_PATH = '/messages';
export const HEALTH_PATH = '/health';

// Room for base64 expansion plus the JSON-RPC envelope
const BODY_OVERHEAD_BYTES = 1024 * 1024;

interface SseSession {
  transport: SSEServerTransport;
  server: McpServer;
}

export interface SseHostOptions {
  logger: Logger;
  createServer: () => McpServer;
  maxInputBytes: number;
}

export interface SseHost {
  app: express.Express;
  listen(port: number, host: string): Promise<AddressInfo>;
  close(): Promise<void>;
  sessionCount(): number;
}

export function bodyLimitFor(maxInputBytes: number): number {
  return Math.ceil((maxInputBytes * 4) / 3) + BODY_OVERHEAD_BYTES;
}

export function createSseHost(options: SseHostOptions): SseHost {
  const { logger, createServer, maxInputBytes } = options;
  const sessions = new Map<string, SseSession>();
  let httpServer: HttpServer | undefined;

  const app = express();

  const openSession = async (_req: Request, res: Response): Promise<void> => {
    const transport = new SSEServerTransport(MESSAGES_PATH, res);
    const server = createServer();
    const sessionId = transport.sessionId;

    sessions.set(sessionId, { transport, server });
    res.on('close', () => {
      sessions.delete(sessionId);
      logger.debug({ sessionId, sessions: sessions.size }, 'SSE session closed');
    });

    await server.connect(transport);
    logger.info({ sessionId, sessions: sessions.size }, 'SSE session opened');
  };

  const postMessage = async (req: Request, res: Response): Promise<void> => {
    const sessionId = typeof req.query.sessionId === 'string' ? req.query.sessionId : '';
    const session = sessions.get(sessionId);
    if (!session) {
      res.status(404).json({ error: `Unknown session: ${sessionId || '(none)'}` });
      return;
    }
    await session.transport.handlePostMessage(req, res, req.body);
  };

  app.get(SSE_PATH, (req: Request, res: Response, next: NextFunction) => {
    openSession(req, res).catch(next);
  });

  app.post(
    MESSAGES_PATH,
    express.json({ limit: bodyLimitFor(maxInputBytes) }),
    (req: Request, res: Response, next: NextFunction) => {
      postMessage(req, res).catch(next);
    },
  );

  app.get(HEALTH_PATH, (_req: Request, res: Response) => {
    res.json({ status: 'ok', sessions: sessions.size });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.error({ error }, 'SSE request failed');
    if (!res.headersSent) {
      res.status(500).json({ error: error instanceof Error ? error.message : String(error) });
    }
  });

  return {
    app,

    listen(port: number, host: string): Promise<AddressInfo> {
      return new Promise((resolve, reject) => {
        const server = app.listen(port, host);
        server.once('error', reject);
        server.once('listening', () => {
          httpServer = server;
          const address = server.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('HTTP server did not bind to a TCP address'));
            return;
          }
          logger.info({ host: address.address, port: address.port }, 'SSE transport listening');
          resolve(address);
        });
      });
    },

    async close(): Promise<void> {
      const open = Array.from(sessions.values());
      sessions.clear();
      await Promise.all(open.map((session) => session.server.close()));

      const server = httpServer;
      httpServer = undefined;
      if (!server) return;

      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
      logger.info('SSE transport closed');
    },

    sessionCount(): number {
      return sessions.size;
    },
  };
}
