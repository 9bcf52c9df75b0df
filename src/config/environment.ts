import 'dotenv/config';
import { resolve } from 'node:path';

export const config = {
  // Location of the YAML settings document
  configPath: resolve(process.cwd(), process.env.CONFIG_PATH ?? 'config.yaml'),

  // Application
  nodeEnv: process.env.NODE_ENV ?? 'development',
  // Empty means "use logging.level from config.yaml, else info"
  logLevel: process.env.LOG_LEVEL?.trim().toLowerCase() ?? '',
} as const;
