/**
 * Response Relay
 *
 * Posts the "processing" placeholder before the agent call starts and later
 * overwrites it with the final text. A placeholder is edited exactly once.
 */

import type { WebClient } from '@slack/web-api';
import { createBridgeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PlaceholderHandle {
  channel: string;
  ts: string;
}

export class ResponseRelay {
  private readonly finalized = new Set<string>();

  constructor(private readonly client: WebClient) {}

  /**
   * Post a plain message, threaded when `threadTs` is given.
   */
  async reply(channel: string, text: string, threadTs?: string): Promise<void> {
    await this.client.chat.postMessage({
      channel,
      text,
      thread_ts: threadTs,
    });
  }

  async sendPlaceholder(
    channel: string,
    text: string,
    threadTs?: string
  ): Promise<PlaceholderHandle> {
    const response = await this.client.chat.postMessage({
      channel,
      text,
      thread_ts: threadTs,
    });

    if (!response.ts) {
      throw createBridgeError('SLACK_API_ERROR', 'chat.postMessage returned no ts for placeholder', {
        metadata: { channel },
      });
    }

    logger.debug({ event: 'placeholder_posted', channelId: channel, ts: response.ts });
    return { channel, ts: response.ts };
  }

  /**
   * Replace the placeholder's text. A second call for the same handle is
   * rejected without reaching Slack.
   */
  async finalize(handle: PlaceholderHandle, text: string): Promise<void> {
    const key = `${handle.channel}:${handle.ts}`;
    if (this.finalized.has(key)) {
      throw createBridgeError('SLACK_API_ERROR', `Placeholder ${key} was already finalized`, {
        metadata: { channel: handle.channel, ts: handle.ts },
      });
    }
    this.finalized.add(key);

    await this.client.chat.update({
      channel: handle.channel,
      ts: handle.ts,
      text,
    });

    logger.debug({ event: 'placeholder_finalized', channelId: handle.channel, ts: handle.ts });
  }
}
