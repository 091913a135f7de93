import assert from 'node:assert/strict';
import { afterEach, describe, it, mock } from 'node:test';
import { logger } from '../logger';

describe('logger', () => {
  const originalLevel = process.env.LOG_LEVEL;

  afterEach(() => {
    mock.restoreAll();
    if (originalLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = originalLevel;
  });

  it('writes every level to stdout', () => {
    process.env.LOG_LEVEL = 'debug';
    const out = mock.method(console, 'log', () => undefined);
    const err = mock.method(console, 'error', () => undefined);

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e', new Error('boom'));

    assert.equal(out.mock.callCount(), 5);
    assert.equal(err.mock.callCount(), 0);
    assert.match(String(out.mock.calls[2].arguments[0]), /\[WARN\].* w$/);
  });

  it('drops messages below LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    const out = mock.method(console, 'log', () => undefined);

    logger.info('hidden');
    logger.warn('shown');

    assert.equal(out.mock.callCount(), 1);
    assert.match(String(out.mock.calls[0].arguments[0]), /shown$/);
  });
});
