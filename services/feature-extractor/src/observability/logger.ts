import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';
import type { LogLevel } from '../config/serviceConfig';

export type { Logger };

const LOGGER_NAME = 'wids-feature-extractor';

export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  const options = { name: LOGGER_NAME, level };
  return destination ? pino(options, destination) : pino(options);
}
