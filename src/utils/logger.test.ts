import { describe, it, expect, afterEach } from 'vitest';
import { closeLogger, configureLogger, eventBus, log, logger, type LogEvent } from './logger';

describe('logger', () => {
  afterEach(() => {
    eventBus.removeAllListeners('log');
  });

  it('pushes every message onto the event bus', () => {
    const events: LogEvent[] = [];
    eventBus.on('log', (event: LogEvent) => events.push(event));
    log('[Board] deleted Item3 (23 left)');
    log('[Board] active column: Up Next', 'debug');
    expect(events.map(e => [e.level, e.message])).toEqual([
      ['info', '[Board] deleted Item3 (23 left)'],
      ['debug', '[Board] active column: Up Next'],
    ]);
  });

  it('takes its level from the loaded config', () => {
    configureLogger({ level: 'debug', file: 'tmp/app.log' });
    expect(logger.level).toBe('debug');
    configureLogger({ level: 'warn', file: 'tmp/app.log' });
    expect(logger.level).toBe('warn');
  });

  it('closeLogger resolves once the logger has finished', async () => {
    await expect(closeLogger()).resolves.toBeUndefined();
    expect(logger.writableFinished).toBe(true);
  });
});
