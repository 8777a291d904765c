/**
 * Integration Tests: MCP server over the SDK in-memory transport
 */

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createMcpServer, MCPServer, STATUS_RESOURCE_URI } from '@mcp/server';
import { createTestContainer, type Deps } from '@app/container';
import { NOT_AN_IMAGE, RED, solidPng, toBase64 } from '@test/fixtures/images';

interface ToolOutput {
  isError: boolean;
  payload: unknown;
}

function readToolOutput(result: unknown): ToolOutput {
  const parsed = CallToolResultSchema.parse(result);
  const first = parsed.content[0];
  if (first?.type !== 'text') {
    throw new Error('Expected a text content item');
  }
  return { isError: parsed.isError ?? false, payload: JSON.parse(first.text) };
}

describe('MCP server', () => {
  let deps: Deps;
  let server: McpServer;
  let client: Client;
  let image: string;

  beforeAll(async () => {
    deps = createTestContainer();
    server = createMcpServer(deps);
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);

    image = toBase64(await solidPng(2, 3, RED));
  });

  afterAll(async () => {
    await client.close();
    await server.close();
  });

  it('should list every tool with its input schema', async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      'analyze_image',
      'get_image_orientation',
      'count_colors',
      'extract_text_info',
      'ops',
    ]);
    const countColors = tools.find((tool) => tool.name === 'count_colors');
    expect(countColors?.inputSchema.required).toEqual(['image']);
    expect(Object.keys(countColors?.inputSchema.properties ?? {})).toEqual([
      'image',
      'sampleLimit',
      'top',
    ]);
  });

  it('should return the orientation report as JSON text', async () => {
    const output = readToolOutput(
      await client.callTool({ name: 'get_image_orientation', arguments: { image } }),
    );

    expect(output).toEqual({
      isError: false,
      payload: { orientation: 'portrait', width: 2, height: 3 },
    });
  });

  it('should return the full analysis', async () => {
    const output = readToolOutput(
      await client.callTool({ name: 'analyze_image', arguments: { image } }),
    );

    expect(output.payload).toMatchObject({
      fileInfo: '2x3 PNG image in RGB mode',
      aspectRatio: 0.67,
      colors: { uniqueColors: 1 },
    });
  });

  it('should report empty input as an InvalidInputError result', async () => {
    const output = readToolOutput(
      await client.callTool({ name: 'count_colors', arguments: { image: '' } }),
    );

    expect(output).toEqual({
      isError: true,
      payload: { error: { kind: 'InvalidInputError', message: 'No image provided' } },
    });
  });

  it('should report undecodable bytes as a DecodeError result', async () => {
    const output = readToolOutput(
      await client.callTool({
        name: 'extract_text_info',
        arguments: { image: toBase64(NOT_AN_IMAGE) },
      }),
    );

    expect(output.isError).toBe(true);
    expect(output.payload).toMatchObject({ error: { kind: 'DecodeError' } });
  });

  it('should answer ping with the configured identity', async () => {
    const output = readToolOutput(
      await client.callTool({ name: 'ops', arguments: { operation: 'ping', message: 'hi' } }),
    );

    expect(output.payload).toMatchObject({
      success: true,
      message: 'pong: hi',
      server: { name: 'image-analysis-mcp', version: deps.config.mcp.version },
    });
  });

  it('should expose the status resource', async () => {
    const { contents } = await client.readResource({ uri: STATUS_RESOURCE_URI });
    const first = contents[0];
    if (!first || !('text' in first) || typeof first.text !== 'string') {
      throw new Error('Expected a text resource');
    }

    expect(first.uri).toBe(STATUS_RESOURCE_URI);
    expect(JSON.parse(first.text)).toEqual({
      healthy: true,
      running: true,
      name: 'image-analysis-mcp',
      version: deps.config.mcp.version,
      transport: 'stdio',
      tools: ['analyze_image', 'get_image_orientation', 'count_colors', 'extract_text_info', 'ops'],
    });
  });
});

describe('MCPServer', () => {
  it('should describe its tools without starting', () => {
    const server = new MCPServer(createTestContainer());

    expect(server.getTools()[0]?.name).toBe('analyze_image');
    expect(server.getStatus()).toEqual({ running: false, transport: 'stdio', tools: 5 });
  });

  it('should ignore stop when not running', async () => {
    const server = new MCPServer(createTestContainer());
    await expect(server.stop()).resolves.toBeUndefined();
  });
});
