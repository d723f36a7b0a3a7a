import pino from 'pino';
import { config } from '../config';

export const logger = pino({
  level: config.logLevel,
  ...(config.nodeEnv === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname'
      }
    }
  }),
  formatters: {
    level: (label) => {
      return { level: label };
    }
  }
});

const timestamp = () => new Date().toISOString().replace('T', ' ').substring(0, 19);

// Add startup banner
export const logStartupBanner = () => {
  const banner = `
recorder-admin | ${timestamp()} | ================================
recorder-admin | ${timestamp()} | Recorder Admin Starting...
recorder-admin | ${timestamp()} | shows:    ${config.showsFile}
recorder-admin | ${timestamp()} | stations: ${config.stationsFile}
recorder-admin | ${timestamp()} | ================================
`;
  console.log(banner);
};
