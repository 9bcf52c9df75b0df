/**
 * Assistant Gateway
 *
 * Turns a user prompt into the final text for a Slack reply by driving the
 * agent SDK's `query()` stream to completion.
 *
 * `resolve()` never rejects: the caller always gets either the agent's text
 * or one of the configured message templates.
 */

import { query, type Options, type SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import type { AssistantSettings, MessageTemplates } from '../config/settings.js';
import { createBridgeError, toBridgeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { extractFragments, renderFragment, type Fragment } from './fragments.js';

/** Slack rejects longer messages; longer replies are replaced, not truncated */
export const MAX_RESPONSE_LENGTH = 4000;

export type QueryFn = (params: {
  prompt: string;
  options?: Options;
}) => AsyncIterable<SDKMessage>;

export interface AssistantGateway {
  resolve(prompt: string): Promise<string>;
}

/**
 * Build the per-request SDK options. Arrays and maps are copied so the SDK
 * never holds a reference into the frozen settings.
 */
export function buildQueryOptions(
  settings: AssistantSettings,
  abortController?: AbortController
): Options {
  return {
    systemPrompt: settings.systemPrompt,
    allowedTools: [...settings.allowedTools],
    mcpServers: { ...settings.mcpServers },
    ...(settings.maxTurns !== undefined && { maxTurns: settings.maxTurns }),
    ...(abortController && { abortController }),
  };
}

/**
 * Consume the stream and join the rendered fragments with newlines.
 * Throws on any stream, protocol or rendering failure.
 */
export async function collectResponse(
  prompt: string,
  settings: AssistantSettings,
  queryFn: QueryFn = query
): Promise<string> {
  const abortController = settings.timeoutMs !== undefined ? new AbortController() : undefined;
  const timer =
    abortController && settings.timeoutMs !== undefined
      ? setTimeout(() => abortController.abort(), settings.timeoutMs)
      : undefined;

  const throwIfTimedOut = (): void => {
    if (abortController?.signal.aborted) {
      throw createBridgeError(
        'AGENT_TIMEOUT',
        `Agent query timed out after ${settings.timeoutMs}ms`
      );
    }
  };

  const fragments: Fragment[] = [];

  try {
    const stream = queryFn({ prompt, options: buildQueryOptions(settings, abortController) });

    for await (const message of stream) {
      logger.debug({ event: 'agent_message_received', messageType: message.type });
      throwIfTimedOut();
      fragments.push(...extractFragments(message, settings.outputToolUse));
    }
    throwIfTimedOut();
  } catch (error) {
    // The SDK surfaces an abort as its own error; report it as the timeout it is
    throwIfTimedOut();
    throw error;
  } finally {
    clearTimeout(timer);
  }

  return fragments.flatMap(renderFragment).join('\n');
}

/**
 * Replace empty and oversized results with their templates.
 * Length is counted in code points.
 */
export function applyLengthPolicy(text: string, messages: MessageTemplates): string {
  const length = Array.from(text).length;
  if (length === 0) return messages.emptyResponse;
  if (length > MAX_RESPONSE_LENGTH) return messages.longResponseError;
  return text;
}

export function createAssistantGateway(
  settings: AssistantSettings,
  messages: MessageTemplates,
  queryFn: QueryFn = query
): AssistantGateway {
  return {
    async resolve(prompt: string): Promise<string> {
      const startTime = Date.now();
      logger.info({ event: 'agent_query_started', promptLength: prompt.length });

      try {
        const text = await collectResponse(prompt, settings, queryFn);
        const result = applyLengthPolicy(text, messages);

        logger.info({
          event: 'agent_query_completed',
          responseLength: text.length,
          substituted: result !== text,
          duration: Date.now() - startTime,
        });
        return result;
      } catch (error) {
        logger.bridgeError(toBridgeError(error, 'AGENT_QUERY_FAILED'), {
          event: 'agent_query_failed',
          promptLength: prompt.length,
          duration: Date.now() - startTime,
        });
        return messages.generalError;
      }
    },
  };
}
