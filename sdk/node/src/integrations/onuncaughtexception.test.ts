import type { ReportStorage } from '@stackreport/types';
import { describe, expect, it, vi } from 'vitest';

import { NodeClient } from '../client';
import { makeErrorHandler } from './onuncaughtexception';

function makeClient(storage: ReportStorage): NodeClient {
  return new NodeClient({ storage, integrations: [] });
}

describe('makeErrorHandler', () => {
  it('stores a report and then calls onFatalError', async () => {
    const write = vi.fn(() => Promise.resolve('stored'));
    const onFatalError = vi.fn();
    const error = new Error('uncaught');
    const handler = makeErrorHandler(makeClient({ write }), {
      exitEvenIfOtherHandlersAreRegistered: true,
      timeout: 100,
      onFatalError,
    });

    await handler({ error, origin: 'uncaughtException' });

    expect(write).toHaveBeenCalledTimes(1);
    expect(onFatalError).toHaveBeenCalledWith(error);
  });

  it('exits even when the report cannot be stored', async () => {
    const onFatalError = vi.fn();
    const handler = makeErrorHandler(
      makeClient({ write: () => Promise.reject(new Error('disk full')) }),
      {
        exitEvenIfOtherHandlersAreRegistered: true,
        timeout: 100,
        onFatalError,
      },
    );

    await handler({
      error: new Error('uncaught'),
      origin: 'uncaughtException',
    });

    expect(onFatalError).toHaveBeenCalledTimes(1);
  });

  it('ignores errors raised while shutting down', async () => {
    const write = vi.fn(() => Promise.resolve('stored'));
    const onFatalError = vi.fn();
    const handler = makeErrorHandler(makeClient({ write }), {
      exitEvenIfOtherHandlersAreRegistered: true,
      timeout: 100,
      onFatalError,
    });

    await handler({ error: new Error('first'), origin: 'uncaughtException' });
    await handler({ error: new Error('second'), origin: 'uncaughtException' });

    expect(write).toHaveBeenCalledTimes(1);
    expect(onFatalError).toHaveBeenCalledTimes(1);
  });

  it('keeps the process alive when other handlers are registered', async () => {
    const ours = (): void => undefined;
    const theirs = (): void => undefined;
    process.on('uncaughtException', ours);
    process.on('uncaughtException', theirs);

    try {
      const write = vi.fn(() => Promise.resolve('stored'));
      const onFatalError = vi.fn();
      const handler = makeErrorHandler(makeClient({ write }), {
        exitEvenIfOtherHandlersAreRegistered: false,
        timeout: 100,
        onFatalError,
      });

      await handler({ error: new Error('first'), origin: 'uncaughtException' });
      await handler({ error: new Error('second'), origin: 'uncaughtException' });

      expect(write).toHaveBeenCalledTimes(2);
      expect(onFatalError).not.toHaveBeenCalled();
    } finally {
      process.off('uncaughtException', ours);
      process.off('uncaughtException', theirs);
    }
  });

  it('calls onFatalError once the timeout passes when storage never settles', async () => {
    const write = vi.fn(() => new Promise<string>(() => undefined));
    const onFatalError = vi.fn();
    const error = new Error('uncaught');
    const handler = makeErrorHandler(makeClient({ write }), {
      exitEvenIfOtherHandlersAreRegistered: true,
      timeout: 20,
      onFatalError,
    });

    await handler({ error, origin: 'uncaughtException' });

    expect(write).toHaveBeenCalledTimes(1);
    expect(onFatalError).toHaveBeenCalledWith(error);
  });
});
