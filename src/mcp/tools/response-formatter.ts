import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { Result } from '../../domain/types';

/**
 * Format a tool Result as an MCP tool response.
 *
 * Failures become `isError` responses carrying `{ error: { kind, message } }`
 * instead of protocol errors, so the client can read the kind and decide
 * whether to resubmit.
 */
export function formatToolResponse<T>(result: Result<T>): CallToolResult {
  if (result.ok) {
    return {
      content: [
        {
          type: 'text',
          text: JSON.stringify(result.value, null, 2),
        },
      ],
    };
  }

  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify({ error: result.error }, null, 2),
      },
    ],
    isError: true,
  };
}
