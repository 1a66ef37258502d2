import { describe, it, expect } from 'vitest';
import { Logger, type LogLevel } from '../../src/logging/logger.js';

function collect(level: LogLevel) {
  const lines: Array<{ level: LogLevel; entry: Record<string, unknown> }> = [];
  const logger = new Logger({ level, service: 'test-svc', sink: (lvl, line) => lines.push({ level: lvl, entry: JSON.parse(line) }) });
  return { logger, lines };
}

describe('Logger', () => {
  it('writes structured JSON lines', () => {
    const { logger, lines } = collect('debug');

    logger.info('hello', { scriptId: 'abc' });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe('info');
    expect(lines[0].entry).toMatchObject({ level: 'info', msg: 'hello', service: 'test-svc', scriptId: 'abc' });
    expect(typeof lines[0].entry.timestamp).toBe('string');
  });

  it('filters below the configured level', () => {
    const { logger, lines } = collect('warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((l) => l.entry.msg)).toEqual(['w', 'e']);
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('carries bindings into child loggers', () => {
    const { logger, lines } = collect('debug');

    const child = logger.child({ component: 'engine' }).child({ scriptId: 's1' });
    child.warn('careful');
    logger.info('parent');

    expect(lines[0].entry).toMatchObject({ component: 'engine', scriptId: 's1', msg: 'careful' });
    expect(lines[1].entry.component).toBeUndefined();
  });

  it('serializes errors', () => {
    const { logger, lines } = collect('debug');

    logger.error('failed', { error: new TypeError('bad input') });

    expect(lines[0].entry.error).toMatchObject({ name: 'TypeError', message: 'bad input' });
  });
});
