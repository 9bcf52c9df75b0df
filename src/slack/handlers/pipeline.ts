/**
 * Shared request pipeline for mentions and direct messages:
 * placeholder → agent → finalize.
 */

import type { AssistantGateway } from '../../agent/gateway.js';
import type { MessageTemplates } from '../../config/settings.js';
import { toBridgeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { ResponseRelay } from '../relay.js';

export interface HandlerDeps {
  gateway: AssistantGateway;
  messages: MessageTemplates;
}

export interface PipelineRequest {
  channel: string;
  prompt: string;
  /** Parent message for threaded replies; undefined in DMs */
  threadTs?: string;
}

export async function relayAssistantReply(
  relay: ResponseRelay,
  { gateway, messages }: HandlerDeps,
  { channel, prompt, threadTs }: PipelineRequest
): Promise<void> {
  const startTime = Date.now();
  const handle = await relay.sendPlaceholder(channel, messages.processingMessage, threadTs);

  let text: string;
  try {
    text = await gateway.resolve(prompt);
  } catch (error) {
    // resolve() is not expected to reject; keep the single-edit guarantee if it does
    logger.bridgeError(toBridgeError(error, 'AGENT_QUERY_FAILED'), {
      event: 'gateway_rejected',
      channelId: channel,
    });
    text = messages.generalError;
  }

  await relay.finalize(handle, text);

  logger.info({
    event: 'reply_relayed',
    channelId: channel,
    threaded: threadTs !== undefined,
    responseLength: text.length,
    duration: Date.now() - startTime,
  });
}

/**
 * Last-resort error reply from a handler's catch-all. A failure here is logged
 * and dropped: the handler must not throw back into Bolt.
 */
export async function replyWithGeneralError(
  relay: ResponseRelay,
  messages: MessageTemplates,
  channel: string,
  threadTs?: string
): Promise<void> {
  try {
    await relay.reply(channel, messages.generalError, threadTs);
  } catch (error) {
    logger.bridgeError(toBridgeError(error, 'SLACK_API_ERROR'), {
      event: 'error_reply_failed',
      channelId: channel,
    });
  }
}
