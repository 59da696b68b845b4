import pino, { type LoggerOptions, type TransportSingleOptions } from 'pino';

function resolveLevel(): string {
  if (process.env.NODE_ENV === 'test') return 'silent';
  return process.env.BBSYNC_LOG_LEVEL?.trim() || 'info';
}

const options: LoggerOptions = {
  level: resolveLevel(),
  redact: {
    paths: ['BITBUCKET_APP_PASSWORD', 'BITBUCKET_TOKEN', 'auth.password', '*.auth.password'],
    remove: true,
  },
};

const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

if (pretty) {
  options.transport = {
    target: 'pino-pretty',
    options: { translateTime: 'SYS:standard', destination: 2 },
  } satisfies TransportSingleOptions;
}

export const logger = pretty ? pino(options) : pino(options, pino.destination(2));
