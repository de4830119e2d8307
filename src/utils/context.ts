import { Config } from '../types/index.js';
import { createLogger, Logger } from './logger.js';

/**
 * Process-wide dependencies handed to every component's constructor.
 * Built once in the entry point; nothing reads config or logs through globals.
 */
export interface AppContext {
  config: Config;
  logger: Logger;
}

export function createAppContext(config: Config): AppContext {
  return { config, logger: createLogger(config) };
}

export function componentLogger(context: AppContext, component: string): Logger {
  return context.logger.child({ component });
}
