/**
 * Pino logger of the open-data core.
 *
 * JSON lines with an ISO timestamp and the level as a label, so the output of
 * the OData and SGS clients can be filtered by `component`.
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

import type { AppConfig } from '../config/env.js';

export const SERVICE_NAME = 'bcb-analytics';

export type LoggerConfig = AppConfig['logger'];

export type LoggerComponent = 'cache' | 'odata' | 'sgs';

export const createLogger = (config: LoggerConfig): Logger => {
  const options: LoggerOptions = {
    level: config.level,
    base: { service: SERVICE_NAME },
    timestamp: pinoLib.stdTimeFunctions.isoTime,
  };

  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
      },
    };
  } else {
    // pino-pretty expects numeric levels
    options.formatters = { level: (label) => ({ level: label }) };
  }

  return pinoLib(options);
};

export const componentLogger = (parent: Logger, component: LoggerComponent): Logger =>
  parent.child({ component });

export { type Logger } from 'pino';
