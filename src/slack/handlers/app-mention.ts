/**
 * App Mention Handler for Channel Conversations
 *
 * Answers `@bot` mentions in a thread under the original message.
 */

import { toBridgeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { ResponseRelay } from '../relay.js';
import { toMentionEvent, type AppMentionArgs } from '../types.js';
import { relayAssistantReply, replyWithGeneralError, type HandlerDeps } from './pipeline.js';

/**
 * Remove every user mention token (`<@U0928FBEH9C>`) and trim.
 */
export function extractMessageText(text: string): string {
  return text.replace(/<@[A-Z0-9]+>/g, '').trim();
}

export function createAppMentionHandler(
  deps: HandlerDeps
): (args: AppMentionArgs) => Promise<void> {
  const { messages } = deps;

  return async function handleMention({ event, client }: AppMentionArgs): Promise<void> {
    const relay = new ResponseRelay(client);
    const mention = toMentionEvent(event);

    try {
      logger.info({
        event: 'app_mention_received',
        channelId: mention.channel,
        ts: mention.ts,
      });

      const prompt = extractMessageText(mention.text);
      if (!prompt) {
        await relay.reply(mention.channel, messages.emptyMessage, mention.ts);
        return;
      }

      await relayAssistantReply(relay, deps, {
        channel: mention.channel,
        prompt,
        threadTs: mention.ts,
      });
    } catch (error) {
      logger.bridgeError(toBridgeError(error), {
        event: 'app_mention_error',
        channelId: mention.channel,
      });
      await replyWithGeneralError(relay, messages, mention.channel, mention.ts);
    }
  };
}
