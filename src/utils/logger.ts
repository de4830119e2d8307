import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { Config } from '../types/index.js';

export type Logger = winston.Logger;

const lineFormat = winston.format.printf(({ timestamp, level, message, component }) => {
  const scope = typeof component === 'string' ? ` (${component})` : '';
  return `${timestamp} [${level.toUpperCase()}]${scope}: ${message}`;
});

export function createLogger(config: Config): Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, component }) => {
          const scope = typeof component === 'string' ? ` (${component})` : '';
          return `${timestamp} [${level}]${scope}: ${message}`;
        })
      ),
    }),
  ];

  if (config.log.toFile) {
    if (!fs.existsSync(config.paths.dataDir)) {
      fs.mkdirSync(config.paths.dataDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(config.paths.dataDir, 'sync.log'),
        maxsize: 5 * 1024 * 1024,
        maxFiles: 3,
      })
    );
  }

  return winston.createLogger({
    level: config.log.level,
    format: winston.format.combine(winston.format.timestamp(), lineFormat),
    transports,
  });
}

/** A logger that drops everything; used where no output is wanted. */
export function createSilentLogger(): Logger {
  return winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });
}
