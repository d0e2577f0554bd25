import type { ReportStorage } from '@stackreport/types';
import { resetInstrumentationHandlers } from '@stackreport/utils';
import { setCurrentClient } from '@stackreport/core';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { init } from '../sdk';
import { consoleIntegration } from './console';

function makeStorage(): ReportStorage & { bodies: string[] } {
  const bodies: string[] = [];
  return {
    bodies,
    write: vi.fn((name: string, extension: string, body: string) => {
      bodies.push(body);
      return Promise.resolve(`${name}.${extension}`);
    }),
  };
}

describe('consoleIntegration', () => {
  afterEach(() => {
    resetInstrumentationHandlers();
    setCurrentClient(undefined);
  });

  it('stores one report per console.error call', async () => {
    const storage = makeStorage();
    const client = init({
      storage,
      outputFormat: 'json',
      defaultIntegrations: false,
      integrations: [consoleIntegration()],
    });

    console.error('failed to load config', new TypeError('bad config'));
    await client.flush();

    expect(storage.bodies).toHaveLength(1);
    expect(JSON.parse(storage.bodies[0] ?? '')).toMatchObject({
      exception_type: 'TypeError',
      exception_value: 'bad config',
    });
  });

  it('stores an empty report when no error is passed', async () => {
    const storage = makeStorage();
    const client = init({
      storage,
      outputFormat: 'json',
      defaultIntegrations: false,
      integrations: [consoleIntegration()],
    });

    console.error('something went wrong');
    await client.flush();

    expect(storage.bodies).toHaveLength(1);
    const report = JSON.parse(storage.bodies[0] ?? '');
    expect(report.frames).toEqual([]);
    expect(report.exception_type).toBeUndefined();
  });

  it('ignores levels that are not configured', async () => {
    const storage = makeStorage();
    const client = init({
      storage,
      defaultIntegrations: false,
      integrations: [consoleIntegration()],
    });

    console.info('just saying hi');
    await client.flush();

    expect(storage.write).not.toHaveBeenCalled();
  });

  it('captures the configured levels', async () => {
    const storage = makeStorage();
    const client = init({
      storage,
      defaultIntegrations: false,
      integrations: [consoleIntegration({ levels: ['warn'] })],
    });

    console.warn('disk almost full');
    console.error('not captured');
    await client.flush();

    expect(storage.write).toHaveBeenCalledTimes(1);
  });

  it('does not throw into the caller when storage fails', async () => {
    const storage: ReportStorage = {
      write: () => Promise.reject(new Error('disk full')),
    };
    const client = init({
      storage,
      defaultIntegrations: false,
      integrations: [consoleIntegration()],
    });

    expect(() => console.error(new Error('boom'))).not.toThrow();
    await expect(client.flush()).resolves.toBe(true);
  });
});
