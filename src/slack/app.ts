/**
 * Slack Bolt App Configuration
 *
 * Supports two modes:
 * - Socket Mode (default): uses the app-level token over WebSocket, no public URL needed
 * - HTTP Mode (`slack.socket_mode: false`): ExpressReceiver on /slack/events with /health
 *
 * Both validate requests with the signing secret.
 */

import bolt from '@slack/bolt';
import type {
  App as AppType,
  ExpressReceiver as ExpressReceiverType,
} from '@slack/bolt';
import type { Settings } from '../config/settings.js';
import { getLogLevel } from '../utils/logger.js';
import { createAppMentionHandler } from './handlers/app-mention.js';
import { createDirectMessageHandler } from './handlers/direct-message.js';
import type { HandlerDeps } from './handlers/pipeline.js';

const { App, ExpressReceiver, LogLevel } = bolt;

/**
 * Creates an ExpressReceiver for HTTP mode with a health endpoint.
 */
export function createReceiver(signingSecret: string): ExpressReceiverType {
  const receiver = new ExpressReceiver({
    signingSecret,
    endpoints: '/slack/events',
  });

  receiver.router.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
    });
  });

  return receiver;
}

/**
 * Creates a Bolt App from validated settings. Bolt's own logging follows the
 * bridge's log level but never goes below INFO unless debugging.
 *
 * @returns Configured App and the receiver (null in socket mode)
 */
export function createSlackApp(settings: Settings): {
  app: AppType;
  receiver: ExpressReceiverType | null;
} {
  const logLevel = getLogLevel() === 'debug' ? LogLevel.DEBUG : LogLevel.INFO;
  const { slack } = settings;

  if (slack.socketMode) {
    const app = new App({
      token: slack.botToken,
      appToken: slack.appToken,
      signingSecret: slack.signingSecret,
      socketMode: true,
      logLevel,
    });
    return { app, receiver: null };
  }

  const receiver = createReceiver(slack.signingSecret);
  const app = new App({
    token: slack.botToken,
    receiver,
    logLevel,
  });
  return { app, receiver };
}

/**
 * Register the two inbound event handlers: channel mentions and DMs.
 */
export function registerHandlers(app: AppType, deps: HandlerDeps): void {
  app.event('app_mention', createAppMentionHandler(deps));
  app.event('message', createDirectMessageHandler(deps));
}

export type SlackApp = AppType;
