/**
 * Direct Message Handler
 *
 * Answers one-to-one DMs. Replies are posted in the DM itself, not threaded.
 */

import { toBridgeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { ResponseRelay } from '../relay.js';
import {
  isAnswerableDirectMessage,
  toDirectMessageEvent,
  type MessageEventArgs,
} from '../types.js';
import { relayAssistantReply, replyWithGeneralError, type HandlerDeps } from './pipeline.js';

export function createDirectMessageHandler(
  deps: HandlerDeps
): (args: MessageEventArgs) => Promise<void> {
  const { messages } = deps;

  return async function handleMessage({ event, client }: MessageEventArgs): Promise<void> {
    const relay = new ResponseRelay(client);
    const message = toDirectMessageEvent(event);

    try {
      if (!isAnswerableDirectMessage(message)) {
        logger.debug({
          event: 'message_ignored',
          channelId: message.channel,
          channelType: message.channelType,
          subtype: message.subtype,
          fromBot: message.botId !== undefined,
        });
        return;
      }

      logger.info({ event: 'direct_message_received', channelId: message.channel, ts: message.ts });

      const prompt = message.text.trim();
      if (!prompt) {
        await relay.reply(message.channel, messages.emptyMessage);
        return;
      }

      await relayAssistantReply(relay, deps, { channel: message.channel, prompt });
    } catch (error) {
      logger.bridgeError(toBridgeError(error), {
        event: 'direct_message_error',
        channelId: message.channel,
      });
      await replyWithGeneralError(relay, messages, message.channel);
    }
  };
}
