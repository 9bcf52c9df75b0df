/**
 * Slack Agent Bridge - Entry Point
 *
 * Loads config.yaml, validates the Slack credentials, then starts the Bolt
 * app with the mention and direct message handlers registered. Any startup
 * failure sets a non-zero exit code before a handler is registered.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { createAssistantGateway } from './agent/gateway.js';
import { config } from './config/environment.js';
import {
  installAnthropicApiKey,
  loadSettings,
  validateCredentials,
  type Settings,
} from './config/settings.js';
import { createSlackApp, registerHandlers, type SlackApp } from './slack/app.js';
import { toBridgeError } from './utils/errors.js';
import { isLogLevel, logger, setLogLevel, type LogLevel } from './utils/logger.js';

/**
 * LOG_LEVEL wins over `logging.level`; both fall back to info.
 */
export function resolveLogLevel(envLevel: string, settings?: Settings): LogLevel {
  if (isLogLevel(envLevel)) return envLevel;
  return settings?.logging.level ?? 'info';
}

function fail(event: string, fields: Record<string, unknown> = {}): null {
  logger.error({ event, ...fields });
  process.exitCode = 1;
  return null;
}

/**
 * Starts the bridge. Returns the running app, or null when startup was
 * refused (process.exitCode is then 1).
 */
export async function startApp(): Promise<SlackApp | null> {
  setLogLevel(resolveLogLevel(config.logLevel));
  if (config.logLevel && !isLogLevel(config.logLevel)) {
    logger.warn({ event: 'log_level_invalid', value: config.logLevel });
  }

  logger.info({ event: 'bridge_starting', nodeEnv: config.nodeEnv, configPath: config.configPath });

  const loaded = loadSettings();
  if (!loaded.ok) {
    logger.bridgeError(loaded.error, { event: 'config_load_failed' });
    return fail('startup_aborted', { reason: loaded.error.code });
  }
  const settings = loaded.settings;
  setLogLevel(resolveLogLevel(config.logLevel, settings));

  logger.info({
    event: 'config_loaded',
    allowedTools: settings.bot.allowedTools,
    mcpServers: Object.keys(settings.bot.mcpServers),
    maxTurns: settings.bot.maxTurns,
    outputToolUse: settings.bot.outputToolUse,
    socketMode: settings.slack.socketMode,
  });

  if (installAnthropicApiKey(settings)) {
    logger.info({ event: 'anthropic_api_key_installed' });
  }

  const missing = validateCredentials(settings);
  if (missing.length > 0) {
    return fail('credentials_missing', { missing, reason: 'MISSING_CREDENTIAL' });
  }
  logger.info({ event: 'credentials_validated' });

  const { app } = createSlackApp(settings);
  registerHandlers(app, {
    gateway: createAssistantGateway(settings.bot, settings.messages),
    messages: settings.messages,
  });

  await app.start(settings.slack.port);

  logger.info({
    event: 'app_started',
    mode: settings.slack.socketMode ? 'socket' : 'http',
    port: settings.slack.socketMode ? 'N/A (WebSocket)' : settings.slack.port,
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ event: 'bridge_stopping', signal });
    app
      .stop()
      .then(() => {
        logger.info({ event: 'bridge_stopped' });
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.bridgeError(toBridgeError(error), { event: 'bridge_stop_failed' });
        process.exit(1);
      });
  };
  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  return app;
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  return import.meta.url === pathToFileURL(resolve(entry)).href;
}

// Auto-start ONLY when run directly (avoid side effects on import)
if (isMainModule()) {
  startApp().catch((error: unknown) => {
    logger.bridgeError(toBridgeError(error), { event: 'bridge_startup_failed' });
    process.exit(1);
  });
}
