import winston from 'winston';
import type { AppConfig } from '../config/environment';

export type Logger = winston.Logger;

export const SERVICE_NAME = 'profile-api';

// Single-line console output for local development
const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service, stack, ...meta }) => {
    let msg = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;

    const metaKeys = Object.keys(meta);
    if (metaKeys.length > 0) {
      msg += ` ${JSON.stringify(meta)}`;
    }
    if (typeof stack === 'string') {
      msg += `\n${stack}`;
    }

    return msg;
  })
);

export function createLogger(config: Pick<AppConfig, 'logLevel' | 'nodeEnv'>): Logger {
  const production = config.nodeEnv === 'production';

  return winston.createLogger({
    level: config.logLevel,
    silent: config.nodeEnv === 'test',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: {
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0'
    },
    transports: [
      new winston.transports.Console(production ? {} : { format: devFormat })
    ]
  });
}
