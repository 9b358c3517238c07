import { Writable } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import winston from 'winston';
import { z } from 'zod';

import { errorFields, logFormat } from '../../../../src/shared/logger/logger';

function captureLogger() {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });

  const log = winston.createLogger({
    level: 'info',
    format: logFormat,
    transports: [new winston.transports.Stream({ stream })],
  });

  return { log, lines };
}

const loggedLineSchema = z.object({
  level: z.string(),
  message: z.object({
    msg: z.string(),
    flow: z.string(),
    errMessage: z.string(),
    stack: z.string().optional(),
  }),
});

describe('errorFields', () => {
  it('keeps message and stack of an Error', () => {
    const err = new Error('duplicate key value');
    expect(errorFields(err)).toEqual({ errMessage: 'duplicate key value', stack: err.stack });
  });

  it('stringifies non-Error values', () => {
    expect(errorFields('boom')).toEqual({ errMessage: 'boom' });
  });

  it('writes the cause into the JSON log line', async () => {
    const { log, lines } = captureLogger();

    log.error({
      msg: 'accounts.register.tx_failed',
      flow: 'accounts.register',
      ...errorFields(new Error('duplicate key value')),
    });

    await vi.waitFor(() => expect(lines).toHaveLength(1));

    const line = loggedLineSchema.parse(JSON.parse(lines[0] ?? '{}'));
    expect(line.level).toBe('error');
    expect(line.message.msg).toBe('accounts.register.tx_failed');
    expect(line.message.errMessage).toBe('duplicate key value');
    expect(line.message.stack?.startsWith('Error: duplicate key value')).toBe(true);
  });
});
