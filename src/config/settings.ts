/**
 * Settings Loader
 *
 * Reads config.yaml once at startup and validates it into an immutable
 * Settings object. Loading never throws: callers get a LoadResult and decide
 * whether to exit.
 *
 * Slack credentials are checked separately by `validateCredentials` so the
 * operator sees exactly which token is missing.
 */

import { readFileSync } from 'fs';
import type { McpServerConfig } from '@anthropic-ai/claude-agent-sdk';
import YAML from 'yaml';
import { z } from 'zod';
import { config } from './environment.js';
import { rawMcpServersSchema, toSdkMcpServers } from './mcp-servers.js';
import { createBridgeError, toBridgeError, type BridgeError } from '../utils/errors.js';
import type { LogLevel } from '../utils/logger.js';

/** Prefix used by the tokens in config.example.yaml */
export const CREDENTIAL_PLACEHOLDER_PREFIX = 'your_slack_';

export const REQUIRED_CREDENTIALS = ['bot_token', 'app_token', 'signing_secret'] as const;

export type RequiredCredential = (typeof REQUIRED_CREDENTIALS)[number];

export const DEFAULT_MESSAGES = {
  emptyMessage: 'Please write a message after mentioning me.',
  processingMessage: 'Processing your request...',
  emptyResponse: 'Sorry, I could not produce a response.',
  longResponseError: 'The response is too long to post in Slack. Please try a narrower request.',
  generalError: 'Sorry, something went wrong while processing your request.',
} as const;

export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful Slack bot.';

const settingsSchema = z.object({
  slack: z
    .object({
      bot_token: z.string().default(''),
      signing_secret: z.string().default(''),
      app_token: z.string().default(''),
      socket_mode: z.boolean().default(true),
      port: z.number().int().positive().default(3000),
    })
    .default({}),
  claude_code: z
    .object({
      api_key: z.string().optional(),
    })
    .default({}),
  bot: z
    .object({
      system_prompt: z.string().default(DEFAULT_SYSTEM_PROMPT),
      allowed_tools: z.array(z.string()).default([]),
      mcp_servers: rawMcpServersSchema.default({}),
      max_turns: z.number().int().positive().optional(),
      output_tool_use: z.boolean().default(false),
      timeout_ms: z.number().int().positive().optional(),
    })
    .default({}),
  messages: z
    .object({
      empty_message: z.string().default(DEFAULT_MESSAGES.emptyMessage),
      processing_message: z.string().default(DEFAULT_MESSAGES.processingMessage),
      empty_response: z.string().default(DEFAULT_MESSAGES.emptyResponse),
      long_response_error: z.string().default(DEFAULT_MESSAGES.longResponseError),
      general_error: z.string().default(DEFAULT_MESSAGES.generalError),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    })
    .default({}),
});

type RawSettings = z.infer<typeof settingsSchema>;

export interface MessageTemplates {
  emptyMessage: string;
  processingMessage: string;
  emptyResponse: string;
  longResponseError: string;
  generalError: string;
}

export interface AssistantSettings {
  systemPrompt: string;
  allowedTools: string[];
  mcpServers: Record<string, McpServerConfig>;
  maxTurns?: number;
  /** Echo tool invocations into the Slack reply */
  outputToolUse: boolean;
  /** Abort the agent query after this many ms; unset means no limit */
  timeoutMs?: number;
}

export interface Settings {
  slack: {
    botToken: string;
    signingSecret: string;
    appToken: string;
    socketMode: boolean;
    port: number;
  };
  claudeCode: {
    apiKey?: string;
  };
  bot: AssistantSettings;
  messages: MessageTemplates;
  logging: {
    level?: LogLevel;
  };
}

export type LoadResult = { ok: true; settings: Settings } | { ok: false; error: BridgeError };

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

function toSettings(raw: RawSettings): Settings {
  return {
    slack: {
      botToken: raw.slack.bot_token,
      signingSecret: raw.slack.signing_secret,
      appToken: raw.slack.app_token,
      socketMode: raw.slack.socket_mode,
      port: raw.slack.port,
    },
    claudeCode: raw.claude_code.api_key ? { apiKey: raw.claude_code.api_key } : {},
    bot: {
      systemPrompt: raw.bot.system_prompt,
      allowedTools: raw.bot.allowed_tools,
      mcpServers: toSdkMcpServers(raw.bot.mcp_servers),
      ...(raw.bot.max_turns !== undefined && { maxTurns: raw.bot.max_turns }),
      outputToolUse: raw.bot.output_tool_use,
      ...(raw.bot.timeout_ms !== undefined && { timeoutMs: raw.bot.timeout_ms }),
    },
    messages: {
      emptyMessage: raw.messages.empty_message,
      processingMessage: raw.messages.processing_message,
      emptyResponse: raw.messages.empty_response,
      longResponseError: raw.messages.long_response_error,
      generalError: raw.messages.general_error,
    },
    logging: {
      ...(raw.logging.level && { level: raw.logging.level }),
    },
  };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a YAML settings document. Exposed separately from `loadSettings` so the
 * parsing rules can be exercised without a file.
 */
export function parseSettings(content: string): LoadResult {
  let document: unknown;
  try {
    document = YAML.parse(content);
  } catch (error) {
    return {
      ok: false,
      error: createBridgeError(
        'CONFIG_INVALID',
        `Failed to parse YAML configuration: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error instanceof Error ? error : undefined }
      ),
    };
  }

  const parsed = settingsSchema.safeParse(document ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      error: createBridgeError(
        'CONFIG_INVALID',
        `Invalid configuration: ${describeIssues(parsed.error)}`,
        { cause: parsed.error }
      ),
    };
  }

  try {
    return { ok: true, settings: deepFreeze(toSettings(parsed.data)) };
  } catch (error) {
    return { ok: false, error: toBridgeError(error, 'CONFIG_INVALID') };
  }
}

/**
 * Load settings from `path` (default: CONFIG_PATH or ./config.yaml).
 */
export function loadSettings(path: string = config.configPath): LoadResult {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    return {
      ok: false,
      error: createBridgeError(
        'CONFIG_NOT_FOUND',
        `Configuration file not found: ${path}. Create it from config.example.yaml`,
        { cause: error instanceof Error ? error : undefined, metadata: { path } }
      ),
    };
  }

  return parseSettings(content);
}

/**
 * Names of Slack credentials that are empty or still hold the example value.
 */
export function validateCredentials(settings: Settings): RequiredCredential[] {
  const values: Record<RequiredCredential, string> = {
    bot_token: settings.slack.botToken,
    app_token: settings.slack.appToken,
    signing_secret: settings.slack.signingSecret,
  };

  return REQUIRED_CREDENTIALS.filter((name) => {
    const value = values[name];
    return !value || value.startsWith(CREDENTIAL_PLACEHOLDER_PREFIX);
  });
}

/**
 * Export `claude_code.api_key` as ANTHROPIC_API_KEY so the agent SDK's own
 * credential lookup finds it. Returns whether a key was installed.
 */
export function installAnthropicApiKey(
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const apiKey = settings.claudeCode.apiKey;
  if (!apiKey) return false;
  env.ANTHROPIC_API_KEY = apiKey;
  return true;
}
