/**
 * Slack Type Definitions
 *
 * Normalized inbound events. Bolt's event payloads are unions over every
 * message subtype; handlers work on these flat shapes instead.
 */

import type {
  AllMiddlewareArgs,
  SlackEventMiddlewareArgs,
} from '@slack/bolt';

export type AppMentionArgs = SlackEventMiddlewareArgs<'app_mention'> & AllMiddlewareArgs;

export type MessageEventArgs = SlackEventMiddlewareArgs<'message'> & AllMiddlewareArgs;

export interface MentionEvent {
  text: string;
  channel: string;
  ts: string;
}

export interface DirectMessageEvent {
  /** Absent for edits, deletions and other non-message subtypes */
  text?: string;
  channel: string;
  ts: string;
  /** 'im' for direct messages */
  channelType?: string;
  /** Set from the event itself or from the message an edit wraps */
  botId?: string;
  subtype?: string;
}

/** Subtypes that still carry a message a person wrote */
const USER_MESSAGE_SUBTYPES: ReadonlySet<string | undefined> = new Set([undefined, 'file_share']);

export function toMentionEvent(event: AppMentionArgs['event']): MentionEvent {
  return {
    text: event.text ?? '',
    channel: event.channel,
    ts: event.ts,
  };
}

function findBotId(event: MessageEventArgs['event']): string | undefined {
  if ('bot_id' in event && typeof event.bot_id === 'string') return event.bot_id;
  if (
    'message' in event &&
    typeof event.message === 'object' &&
    event.message !== null &&
    'bot_id' in event.message &&
    typeof event.message.bot_id === 'string'
  ) {
    return event.message.bot_id;
  }
  return undefined;
}

export function toDirectMessageEvent(event: MessageEventArgs['event']): DirectMessageEvent {
  const botId = findBotId(event);
  return {
    channel: event.channel,
    ts: event.ts,
    ...('text' in event && typeof event.text === 'string' && { text: event.text }),
    ...('channel_type' in event &&
      typeof event.channel_type === 'string' && { channelType: event.channel_type }),
    ...(botId !== undefined && { botId }),
    ...('subtype' in event && typeof event.subtype === 'string' && { subtype: event.subtype }),
  };
}

/**
 * Only human-authored direct messages are answered. Anything from a bot,
 * including this one, is skipped to avoid reply loops, and so are edits,
 * deletions and other events that carry no new text.
 */
export function isAnswerableDirectMessage(
  event: DirectMessageEvent
): event is DirectMessageEvent & { text: string } {
  return (
    event.channelType === 'im' &&
    USER_MESSAGE_SUBTYPES.has(event.subtype) &&
    event.botId === undefined &&
    typeof event.text === 'string'
  );
}
