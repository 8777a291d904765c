/**
 * Unit Tests: SSE transport host
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import pino from 'pino';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { bodyLimitFor, createSseHost, type SseHost } from '@mcp/server/sse';
import { createMcpServer } from '@mcp/server';
import { createTestContainer } from '@app/container';
import { BLUE, solidPng, toBase64 } from '@test/fixtures/images';

function createHost(): SseHost {
  const deps = createTestContainer();
  return createSseHost({
    logger: pino({ level: 'silent' }),
    createServer: () => createMcpServer(deps, { transport: 'sse' }),
    maxInputBytes: deps.config.analysis.maxInputBytes,
  });
}

describe('bodyLimitFor', () => {
  it('should leave room for base64 expansion and the envelope', () => {
    expect(bodyLimitFor(3 * 1024 * 1024)).toBe(4 * 1024 * 1024 + 1024 * 1024);
  });
});

describe('createSseHost', () => {
  it('should start with no sessions and close cleanly before listening', async () => {
    const host = createHost();

    expect(host.sessionCount()).toBe(0);
    await expect(host.close()).resolves.toBeUndefined();
  });
});

describe('SSE transport over HTTP', () => {
  let host: SseHost;
  let baseUrl: URL;
  let image: string;
  const clients: Client[] = [];

  const connectClient = async (): Promise<Client> => {
    const client = new Client({ name: 'sse-test-client', version: '1.0.0' });
    await client.connect(new SSEClientTransport(new URL('/sse', baseUrl)));
    clients.push(client);
    return client;
  };

  beforeAll(async () => {
    image = toBase64(await solidPng(4, 2, BLUE));
  });

  beforeEach(async () => {
    host = createHost();
    const address = await host.listen(0, '127.0.0.1');
    baseUrl = new URL(`http://127.0.0.1:${address.port}`);
  });

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.close()));
    await host.close();
  });

  it('should serve tool calls to an SDK client', async () => {
    const client = await connectClient();

    const result = CallToolResultSchema.parse(
      await client.callTool({ name: 'get_image_orientation', arguments: { image } }),
    );
    const first = result.content[0];

    expect(result.isError ?? false).toBe(false);
    expect(first?.type).toBe('text');
    expect(first?.type === 'text' ? JSON.parse(first.text) : null).toEqual({
      orientation: 'landscape',
      width: 4,
      height: 2,
    });
  });

  it('should give every connection its own session', async () => {
    await connectClient();
    await connectClient();

    expect(host.sessionCount()).toBe(2);

    const response = await fetch(new URL('/health', baseUrl));
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok', sessions: 2 });
  });

  it('should report health with no open sessions', async () => {
    const response = await fetch(new URL('/health', baseUrl));

    expect(await response.json()).toEqual({ status: 'ok', sessions: 0 });
  });

  it('should reject messages for an unknown session with 404', async () => {
    const response = await fetch(new URL('/messages?sessionId=missing', baseUrl), {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'tools/list' }),
    });

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Unknown session: missing' });
  });
});
