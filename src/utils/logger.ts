import winston from 'winston';

import { config } from '@config/env.config.js';

const pretty = winston.format.printf(({ timestamp, level, message, stack, ...metadata }) => {
  let line = `${String(timestamp)} ${level}: ${String(message)}`;
  if (stack) line += `\n${String(stack)}`;
  if (Object.keys(metadata).length > 0) line += ` ${JSON.stringify(metadata)}`;
  return line;
});

/** Serializes `err` metadata, which JSON.stringify would otherwise print as `{}`. */
const errorMeta = winston.format((info) => {
  const err: unknown = info.err;
  if (err instanceof Error) {
    info.err = { name: err.name, message: err.message, stack: err.stack };
  }
  return info;
});

export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  silent: config.NODE_ENV === 'test',
  format:
    config.NODE_ENV === 'production'
      ? winston.format.combine(
          errorMeta(),
          winston.format.timestamp(),
          winston.format.errors({ stack: true }),
          winston.format.json(),
        )
      : winston.format.combine(
          errorMeta(),
          winston.format.colorize(),
          winston.format.timestamp({ format: 'HH:mm:ss' }),
          winston.format.errors({ stack: true }),
          pretty,
        ),
  transports: [new winston.transports.Console()],
  exitOnError: false,
});
