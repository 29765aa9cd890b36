import pino from 'pino';
import { env } from './environment';

// Phone numbers never reach the log output
const redactPaths = ['phone', 'phones', 'oldPhone', 'newPhone', '*.phone', '*.phones'];

const prettyPrint = env.LOG_PRETTY && env.NODE_ENV === 'development';

// Logs go to stderr; stdout belongs to the command loop
export const logger = pino(
  {
    level: env.LOG_LEVEL,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    transport: prettyPrint
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        }
      : undefined,
  },
  prettyPrint ? undefined : pino.destination(2)
);
