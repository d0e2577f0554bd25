import { defineIntegration, getClient } from '@stackreport/core';
import type {
  Client,
  HandlerDataUnhandledRejection,
  IntegrationFn,
} from '@stackreport/types';
import {
  addGlobalUnhandledRejectionInstrumentationHandler,
  consoleSandbox,
  logger,
} from '@stackreport/utils';

import { DEBUG_BUILD } from '../debug-build';
import {
  DEFAULT_SHUTDOWN_TIMEOUT,
  logAndExitProcess,
} from './onuncaughtexception';

/**
 * - `none`：只生成报告
 * - `warn`：生成报告并打印警告
 * - `strict`：生成报告、打印警告，然后以退出码 1 结束进程
 */
type UnhandledRejectionMode = 'none' | 'warn' | 'strict';

interface OnUnhandledRejectionOptions {
  /**
   * 默认为 warn
   */
  mode: UnhandledRejectionMode;

  /**
   * strict 模式下退出前等待报告写完的最长时间（毫秒）
   * 默认为 2000
   */
  timeout: number;
}

const INTEGRATION_NAME = 'OnUnhandledRejection';

const _onUnhandledRejectionIntegration = ((
  options: Partial<OnUnhandledRejectionOptions> = {},
) => {
  const _options: OnUnhandledRejectionOptions = {
    mode: 'warn',
    timeout: DEFAULT_SHUTDOWN_TIMEOUT,
    ...options,
  };

  return {
    name: INTEGRATION_NAME,
    setup(client) {
      const handler = makeUnhandledPromiseHandler(client, _options);
      addGlobalUnhandledRejectionInstrumentationHandler((data) => {
        if (getClient() !== client) {
          return;
        }
        void handler(data);
      });
    },
  };
}) satisfies IntegrationFn;

/**
 * 为未处理的 Promise 拒绝生成报告
 */
export const onUnhandledRejectionIntegration = defineIntegration(
  _onUnhandledRejectionIntegration,
);

/**
 * 创建 unhandledRejection 的处理函数
 */
export function makeUnhandledPromiseHandler(
  client: Client,
  options: OnUnhandledRejectionOptions,
): (data: HandlerDataUnhandledRejection) => Promise<void> {
  return async ({ reason }: HandlerDataUnhandledRejection): Promise<void> => {
    const capture = client
      .captureException(reason)
      .then(undefined, (e: unknown) => {
        DEBUG_BUILD &&
          logger.error('Failed to store unhandled rejection report:', e);
      });

    if (options.mode === 'strict') {
      // 进程马上要退出，写入最多等待 timeout
      await client.flush(options.timeout);
    } else {
      await capture;
    }

    handleRejection(reason, options);
  };
}

/**
 * 按 mode 打印警告或结束进程
 */
function handleRejection(
  reason: unknown,
  options: OnUnhandledRejectionOptions,
): void {
  if (options.mode === 'none') {
    return;
  }

  const rejectionWarning =
    'This error originated either by ' +
    'throwing inside of an async function without a catch block, ' +
    'or by rejecting a promise which was not handled with .catch().' +
    ' The promise rejected with the reason:';

  if (options.mode === 'warn') {
    consoleSandbox(() => {
      // eslint-disable-next-line no-console
      console.warn(rejectionWarning);
      // eslint-disable-next-line no-console
      console.error(reason);
    });
    return;
  }

  consoleSandbox(() => {
    // eslint-disable-next-line no-console
    console.warn(rejectionWarning);
  });
  logAndExitProcess(reason);
}
