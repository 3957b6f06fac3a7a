import pino, { type LoggerOptions, type TransportSingleOptions } from 'pino';

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL?.trim() || 'info',
  redact: {
    paths: ['GITHUB_TOKEN', 'credential', 'token', '*.credential', '*.token'],
    remove: true,
  },
};

if (process.env.NODE_ENV !== 'production') {
  options.transport = {
    target: 'pino-pretty',
    options: { translateTime: 'SYS:standard' },
  } satisfies TransportSingleOptions;
}

export const logger = pino(options);
