import winston from 'winston';
import { EventEmitter } from 'events';
import { DEFAULT_CONFIG, type KanbanConfig } from './config';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogEvent {
  message: string;
  level: LogLevel;
  timestamp: Date;
}

/**
 * Process-wide event bus
 * log: a message was written through `log()`
 */
export const eventBus = new EventEmitter();

const isTest = process.env.NODE_ENV === 'test';

function createTransports(logging: KanbanConfig['logging']) {
  return isTest
    ? [new winston.transports.Console()]
    : [new winston.transports.File({ filename: logging.file })];
}

/**
 * Winston logger. The terminal belongs to blessed, so nothing goes to the
 * console; under test the logger is silenced and no file is opened.
 * Starts on the defaults until `configureLogger` is called with the user config.
 */
export const logger = winston.createLogger({
  level: DEFAULT_CONFIG.logging.level,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: createTransports(DEFAULT_CONFIG.logging),
});

export function configureLogger(logging: KanbanConfig['logging']) {
  logger.configure({
    level: logging.level,
    silent: isTest,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports: createTransports(logging),
  });
}

/**
 * Writes to the log file and pushes the message to the TUI.
 */
export const log = (message: string, level: LogLevel = 'info') => {
  logger.log(level, message);
  const event: LogEvent = { message, level, timestamp: new Date() };
  eventBus.emit('log', event);
};

/** Ends the logger and resolves once pending writes are flushed. */
export function closeLogger(): Promise<void> {
  return new Promise(resolve => {
    logger.once('finish', () => resolve());
    logger.end();
  });
}
