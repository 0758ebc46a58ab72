import { describe, expect, it } from 'vitest';

import { createLogger, Logger } from '../src/utils/logger.js';
import { captureStream } from './zip-fixture.js';

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const sink = captureStream();
    const logger = new Logger({ level: 'warn', stream: sink.stream });

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('shown');

    const lines = sink.text().trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+ warn shown$/);
  });

  it('writes JSON lines with the child scope', () => {
    const sink = captureStream();
    const logger = new Logger({ level: 'debug', json: true, stream: sink.stream }).child('analyze').child('select');

    logger.debug('files selected', { files: ['plan.txt'] });

    const event = JSON.parse(sink.text()) as Record<string, unknown>;
    expect(event).toMatchObject({
      level: 'debug',
      scope: 'analyze:select',
      message: 'files selected',
      data: { files: ['plan.txt'] },
    });
  });

  it('prefixes plain lines with the scope', () => {
    const sink = captureStream();
    new Logger({ stream: sink.stream, scope: 'completion' }).info('response', { status: 200 });
    expect(sink.text()).toMatch(/^\S+ info \[completion\] response \{"status":200\}\n$/);
  });
});

describe('createLogger', () => {
  it('logs debug only when verbose', () => {
    const normal = captureStream();
    const verbose = captureStream();

    createLogger({ stream: normal.stream }).debug('archive read');
    createLogger({ verbose: true, stream: verbose.stream }).debug('archive read');

    expect(normal.text()).toBe('');
    expect(verbose.text()).toMatch(/^\S+ debug archive read\n$/);
  });

  it('emits JSON under --quiet', () => {
    const sink = captureStream();
    createLogger({ quiet: true, stream: sink.stream }).warn('slow response');
    expect(JSON.parse(sink.text())).toMatchObject({ level: 'warn', message: 'slow response' });
  });
});
