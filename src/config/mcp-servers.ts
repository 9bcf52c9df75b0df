/**
 * MCP Server Configuration
 *
 * Transforms the `bot.mcp_servers` section of config.yaml into the server map
 * accepted by the agent SDK's `query()` options. Supports the three MCP
 * transports:
 * - stdio: Local process communication (default)
 * - http: HTTP with streamable responses
 * - sse: Server-Sent Events for streaming
 *
 * @see https://modelcontextprotocol.io/docs/concepts/transports
 */

import type { McpServerConfig } from '@anthropic-ai/claude-agent-sdk';
import { z } from 'zod';
import { createBridgeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const stringMap = z.record(z.string(), z.string());

export const rawMcpServerSchema = z.object({
  type: z.enum(['stdio', 'http', 'sse']).default('stdio'),
  enabled: z.boolean().default(true),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  env: stringMap.optional(),
  url: z.string().optional(),
  headers: stringMap.optional(),
  description: z.string().optional(),
});

export const rawMcpServersSchema = z.record(z.string(), rawMcpServerSchema);

export type RawMcpServer = z.infer<typeof rawMcpServerSchema>;

/**
 * Convert one server entry. Throws CONFIG_INVALID when the transport is
 * missing its required field.
 */
export function toSdkMcpServer(name: string, server: RawMcpServer): McpServerConfig {
  if (server.type === 'stdio') {
    if (!server.command) {
      throw createBridgeError(
        'CONFIG_INVALID',
        `MCP server '${name}' is stdio type but missing 'command'`
      );
    }
    // SDK defaults to stdio, so the type field is omitted
    return {
      command: server.command,
      ...(server.args && { args: server.args }),
      ...(server.env && { env: server.env }),
    };
  }

  if (!server.url) {
    throw createBridgeError(
      'CONFIG_INVALID',
      `MCP server '${name}' is ${server.type} type but missing 'url'`
    );
  }

  return {
    type: server.type,
    url: server.url,
    ...(server.headers && { headers: server.headers }),
  };
}

/**
 * Convert the whole map, skipping servers marked `enabled: false`.
 */
export function toSdkMcpServers(
  servers: Record<string, RawMcpServer>
): Record<string, McpServerConfig> {
  const result: Record<string, McpServerConfig> = {};

  for (const [name, server] of Object.entries(servers)) {
    if (!server.enabled) {
      logger.debug({ event: 'mcp_server_disabled', server: name });
      continue;
    }
    result[name] = toSdkMcpServer(name, server);
  }

  return result;
}
