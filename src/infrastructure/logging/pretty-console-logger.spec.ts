import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';

import { createPrettyConsoleLogger } from './pretty-console-logger';

describe('createPrettyConsoleLogger', () => {
  let consoleErrorSpy: MockInstance<typeof console.error>;

  const firstLine = (): string => String(consoleErrorSpy.mock.calls[0]?.[0]);

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  it('[HP] has the specified level', () => {
    const logger = createPrettyConsoleLogger({ level: 'warn', useColor: false });

    expect(logger.level).toBe('warn');
  });

  it('[HP] emits error messages when level=error', () => {
    const logger = createPrettyConsoleLogger({ level: 'error', useColor: false });

    logger.error('something bad');

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(firstLine()).toBe('  ✖  something bad');
  });

  it('[HP] suppresses info messages when level=error', () => {
    const logger = createPrettyConsoleLogger({ level: 'error', useColor: false });

    logger.info('verbose message');

    expect(consoleErrorSpy).not.toHaveBeenCalled();
  });

  it('[HP] emits all levels when level=trace', () => {
    const logger = createPrettyConsoleLogger({ level: 'trace', useColor: false });

    logger.error('e');
    logger.warn('w');
    logger.info('i');
    logger.debug('d');
    logger.trace('t');

    expect(consoleErrorSpy).toHaveBeenCalledTimes(5);
  });

  it('[HP] routes log() through the level threshold', () => {
    const logger = createPrettyConsoleLogger({ level: 'debug', useColor: false });

    logger.log('debug', 'test message');
    logger.log('trace', 'too verbose');

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    expect(firstLine()).toBe('  ◆  test message');
  });

  it('[HP] formats fields in output', () => {
    const logger = createPrettyConsoleLogger({ level: 'info', useColor: false });

    logger.info('with fields', { key: 'val', count: 42 });

    expect(firstLine()).toBe('  ●  with fields key=val count=42');
  });

  it('[HP] formats durationMs below one second in milliseconds', () => {
    const logger = createPrettyConsoleLogger({ level: 'info', useColor: false });

    logger.info('with duration', { durationMs: 500 });

    expect(firstLine()).toBe('  ●  with duration 500ms');
  });

  it('[HP] formats durationMs ≥ 1000ms as seconds', () => {
    const logger = createPrettyConsoleLogger({ level: 'info', useColor: false });

    logger.info('with duration', { durationMs: 2000 });

    expect(firstLine()).toBe('  ●  with duration 2.00s');
  });

  it('[HP] appends the error message when stacks are off', () => {
    const logger = createPrettyConsoleLogger({ level: 'warn', useColor: false });

    logger.warn('skipped', { file: 'a.py' }, new Error('boom'));

    expect(firstLine()).toBe('  ▲  skipped file=a.py (boom)');
  });

  it('[HP] includeStack appends error stack trace', () => {
    const logger = createPrettyConsoleLogger({ level: 'error', useColor: false, includeStack: true });
    const err = new Error('stack test');

    logger.error('failed', {}, err);

    expect(firstLine()).toContain('\nError: stack test');
  });

  it('[ED] skips undefined fields', () => {
    const logger = createPrettyConsoleLogger({ level: 'info', useColor: false });

    logger.info('msg', { present: 'yes', absent: undefined });

    expect(firstLine()).toBe('  ●  msg present=yes');
  });

  it('[HP] wraps the message in ANSI colour when enabled', () => {
    const logger = createPrettyConsoleLogger({ level: 'error', useColor: true });

    logger.error('red alert');

    expect(firstLine()).toBe('  \x1b[31m✖\x1b[0m  \x1b[31mred alert\x1b[0m');
  });
});
