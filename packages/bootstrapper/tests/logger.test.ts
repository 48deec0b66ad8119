import { describe, it, expect } from 'vitest';
import { captureLogger } from './support/fakes.js';

describe('Logger', () => {
  it('should write one JSON object per entry with flattened meta', () => {
    const { log, entries } = captureLogger();
    log.info('Starting server on 0.0.0.0:8000', { host: '0.0.0.0', port: 8000 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      level: 'info',
      message: 'Starting server on 0.0.0.0:8000',
      host: '0.0.0.0',
      port: 8000,
    });
    expect(typeof entries[0].timestamp).toBe('string');
  });

  it('should drop entries below the configured level', () => {
    const { log, messages } = captureLogger('warn');
    log.debug('phase');
    log.info('cache detected');
    log.warn('diagnostics failed');
    log.error('handoff failed');

    expect(messages()).toEqual(['diagnostics failed', 'handoff failed']);
  });

  it('should honour a level change', () => {
    const { log, messages } = captureLogger('error');
    log.info('hidden');
    log.setLevel('info');
    log.info('shown');

    expect(messages()).toEqual(['shown']);
  });

  it('should serialize errors by name and message', () => {
    const { log, entries } = captureLogger();
    log.warn('Ingestion failed (continue anyway)', { error: new TypeError('bad exit') });

    expect(entries[0].error).toEqual({ name: 'TypeError', message: 'bad exit' });
  });
});
