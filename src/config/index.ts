import { join } from 'path';

const configDir = process.env.RECORDER_ADMIN_CONFIG_DIR || './config';

export const config = {
  port: parseInt(process.env.RECORDER_ADMIN_PORT || '5000', 10),
  host: process.env.RECORDER_ADMIN_HOST || '0.0.0.0',
  configDir,
  showsFile: process.env.RECORDER_ADMIN_SHOWS_FILE || join(configDir, 'config_shows.json'),
  stationsFile: process.env.RECORDER_ADMIN_STATIONS_FILE || join(configDir, 'config_stations.json'),
  // Signs the flash cookie
  secretKey: process.env.RECORDER_ADMIN_SECRET_KEY || 'dev',
  nodeEnv: process.env.RECORDER_ADMIN_NODE_ENV || 'development',
  logLevel: process.env.RECORDER_ADMIN_LOG_LEVEL || 'info',
} as const;

export type Config = typeof config;
