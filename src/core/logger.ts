import pino from 'pino';
import { config, type Config } from './config';

export type LogLevel = Config['LOG_LEVEL'];

// stdout belongs to progress output and --print-metadata, logs go to stderr
const STDERR = 2;

const loggerConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL,
  formatters: {
    level: (label) => ({ level: label }),
  },
};

function createLogger(): pino.Logger {
  if (config.NODE_ENV === 'development') {
    loggerConfig.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR,
      },
    };
    return pino(loggerConfig);
  }
  return pino(loggerConfig, pino.destination(STDERR));
}

export const logger = createLogger();

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
