import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import pino from 'pino';
import { fromPino } from '../../../src/infrastructure/logging/pinoLogger.js';

function captureLines(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  const lines = () =>
    chunks
      .join('')
      .split('\n')
      .filter((line) => line.length > 0)
      .map((line): Record<string, unknown> => JSON.parse(line));
  return { stream, lines };
}

describe('fromPino', () => {
  it('should write structured fields and the message', () => {
    const { stream, lines } = captureLines();
    const logger = fromPino(pino({ name: 'zip2sqlite', level: 'debug' }, stream));

    logger.info({ table: 'people', attempts: 2 }, 'transfer completed');

    expect(lines()).toEqual([
      expect.objectContaining({ name: 'zip2sqlite', level: 30, table: 'people', attempts: 2, msg: 'transfer completed' }),
    ]);
  });

  it('should carry child bindings', () => {
    const { stream, lines } = captureLines();
    const logger = fromPino(pino({ level: 'debug' }, stream)).child({ table: 'orders' });

    logger.warn({ exponent: 23 }, 'backing off');

    expect(lines()[0]).toMatchObject({ level: 40, table: 'orders', exponent: 23, msg: 'backing off' });
  });

  it('should drop entries below the level', () => {
    const { stream, lines } = captureLines();
    const logger = fromPino(pino({ level: 'warn' }, stream));

    logger.debug({}, 'hidden');
    logger.error({}, 'shown');

    expect(lines().map((line) => line['msg'])).toEqual(['shown']);
  });
});
