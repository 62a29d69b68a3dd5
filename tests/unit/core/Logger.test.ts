/**
 * Logger formatting tests
 */
import { describe, it, expect } from 'vitest';
import { createChildLogger, formatContext, logger, setLogLevel } from '../../../src/core/Logger.js';

describe('formatContext', () => {
  it('should list priority fields first', () => {
    const context = formatContext(
      { durationMs: 12, status: 200, hostname: 'a.example.com', msg: 'done' },
      ['msg']
    );

    expect(context).toBe(' (hostname=a.example.com, status=200, durationMs=12)');
  });

  it('should summarise arrays and objects', () => {
    expect(formatContext({ hostnames: ['a.example.com', 'b.example.com'] }, [])).toBe(
      ' (hostnames=a.example.com, b.example.com)'
    );
    expect(formatContext({ hostnames: ['a', 'b', 'c', 'd'] }, [])).toBe(' (hostnames=4 items)');
    expect(formatContext({ failures: { a: 1, b: 2 } }, [])).toBe(' (failures={2 fields})');
  });

  it('should shorten pass identifiers and skip empty values', () => {
    expect(formatContext({ passId: '0f8fad5b-d9cb-469f-a165-70867728950e', previous: null }, [])).toBe(
      ' (passId=0f8fad5b...)'
    );
  });

  it('should return an empty string without context', () => {
    expect(formatContext({ msg: 'hello' }, ['msg'])).toBe('');
  });
});

describe('logger', () => {
  it('should change the level at runtime for child loggers created afterwards', () => {
    const previous = logger.level;

    setLogLevel('debug');
    expect(logger.level).toBe('debug');
    expect(createChildLogger({ service: 'Test' }).isLevelEnabled('debug')).toBe(true);

    setLogLevel('silent');
    expect(createChildLogger({ service: 'Test' }).isLevelEnabled('error')).toBe(false);

    logger.level = previous;
  });
});
