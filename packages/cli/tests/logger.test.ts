import { describe, it, expect } from 'vitest';
import { createSink, testLogger } from './helpers';

describe('createLogger', () => {
  it('writes JSON lines with a label level', () => {
    const sink = createSink();
    testLogger(sink).info({ bytes: 42 }, 'payload built');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toMatchObject({ level: 'info', name: 'epcqr', bytes: 42, msg: 'payload built' });
    expect(typeof sink.lines[0]?.timestamp).toBe('string');
  });

  it('redacts IBAN and BIC at the top level and one level down', () => {
    const sink = createSink();
    testLogger(sink).debug(
      { iban: 'DE90830654080004104242', bic: 'GENODEF1SLR', input: { iban: 'DE90830654080004104242' } },
      'building payload'
    );

    expect(sink.lines[0]).toMatchObject({
      iban: '[REDACTED]',
      bic: '[REDACTED]',
      input: { iban: '[REDACTED]' },
    });
  });

  it('keeps identifiers when redaction is off', () => {
    const sink = createSink();
    testLogger(sink, 'debug', false).debug({ iban: 'DE90830654080004104242' }, 'building payload');

    expect(sink.lines[0]?.iban).toBe('DE90830654080004104242');
  });

  it('drops lines below the configured level', () => {
    const sink = createSink();
    const logger = testLogger(sink, 'warn');
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.lines.map((line) => line.msg)).toEqual(['shown']);
  });
});
