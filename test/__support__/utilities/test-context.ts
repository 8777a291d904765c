/**
 * Logger and ToolContext helpers for unit tests
 */

import pino from 'pino';
import { createAppConfig, type AppConfig } from '@config/app-config';
import type { ServerIdentity, ToolContext } from '@mcp/context/types';
import type { Logger } from '@lib/logger';
import type { DecodedImage, ErrorReport, Result, RgbTuple } from '@domain/types';

export interface CapturedLogger {
  logger: Logger;
  entries(): Array<Record<string, unknown>>;
}

/**
 * Real pino logger writing JSON lines into memory
 */
export function createCapturingLogger(level: pino.Level = 'debug'): CapturedLogger {
  const lines: string[] = [];
  const logger = pino({ level }, { write: (line: string) => lines.push(line) });

  return {
    logger,
    entries: () =>
      lines.map((line): Record<string, unknown> => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === 'object' && parsed !== null ? { ...parsed } : {};
      }),
  };
}

export function createTestConfig(env: Record<string, string> = {}): AppConfig {
  return createAppConfig({ LOG_LEVEL: 'silent', ...env });
}

export function createTestContext(
  overrides: Partial<ToolContext> = {},
  server?: ServerIdentity,
): ToolContext {
  return {
    logger: pino({ level: 'silent' }),
    analysis: createTestConfig().analysis,
    ...(server && { server }),
    ...overrides,
  };
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.value;
}

export function unwrapError<T>(result: Result<T>): ErrorReport {
  if (result.ok) {
    throw new Error('Expected failure, got success');
  }
  return result.error;
}

/**
 * In-memory DecodedImage painted pixel by pixel
 */
export function paintImage(
  width: number,
  height: number,
  paint: (x: number, y: number) => RgbTuple,
  overrides: Partial<Omit<DecodedImage, 'width' | 'height' | 'pixels'>> = {},
): DecodedImage {
  const pixels = new Uint8Array(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [r, g, b] = paint(x, y);
      pixels.set([r, g, b], (y * width + x) * 3);
    }
  }
  return { width, height, format: 'PNG', mode: 'RGB', channels: 3, pixels, ...overrides };
}
