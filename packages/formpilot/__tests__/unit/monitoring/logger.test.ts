import { describe, expect, test } from 'vitest';
import { Logger, redactObject, redactValue, type LogLevel } from '../../../src/monitoring/logger.js';

function capture(level: LogLevel = 'debug') {
  const lines: { level: LogLevel; entry: Record<string, unknown> }[] = [];
  const logger = new Logger({ level, service: 'TestService' }, (lvl, line) => {
    lines.push({ level: lvl, entry: JSON.parse(line) });
  });
  return { logger, lines };
}

describe('Logger', () => {
  test('writes one JSON entry with service and data', () => {
    const { logger, lines } = capture();

    logger.info('Step started', { step: 1, fields: ['email'] });

    expect(lines).toHaveLength(1);
    expect(lines[0]?.level).toBe('info');
    expect(lines[0]?.entry).toMatchObject({ level: 'info', msg: 'Step started', service: 'TestService', step: 1 });
    expect(lines[0]?.entry.fields).toEqual(['email']);
  });

  test('drops entries below the configured level', () => {
    const { logger, lines } = capture('warn');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(lines.map((l) => l.level)).toEqual(['warn', 'error']);
  });

  test('child loggers carry their bindings', () => {
    const { logger, lines } = capture();

    logger.child({ runId: 'run-1' }).info('hello');

    expect(lines[0]?.entry).toMatchObject({ runId: 'run-1', service: 'TestService' });
  });

  test('redacts secrets in logged data', () => {
    const { logger, lines } = capture();

    logger.info('Signing in', { password: 'test-secret', credentials: { apiKey: 'test-secret' } });

    expect(lines[0]?.entry.password).toBe('[REDACTED]');
    expect(lines[0]?.entry.credentials).toEqual({ apiKey: '[REDACTED]' });
  });
});

describe('redaction', () => {
  test('redacts sensitive keys regardless of case', () => {
    expect(redactValue('X-Auth-Token', 'abc')).toBe('[REDACTED]');
    expect(redactValue('label', 'First Name')).toBe('First Name');
  });

  test('scrubs emails from free text', () => {
    expect(redactValue('message', 'typed jane@example.com into field')).toBe('typed [REDACTED] into field');
  });

  test('walks nested objects and arrays', () => {
    expect(redactObject({ steps: [{ password: 'test-secret' }, 'plain'], count: 2 })).toEqual({
      steps: [{ password: '[REDACTED]' }, 'plain'],
      count: 2,
    });
  });
});
