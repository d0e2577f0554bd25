import { defineIntegration, getClient } from '@stackreport/core';
import type { Client, HandlerDataError, IntegrationFn } from '@stackreport/types';
import {
  addGlobalErrorInstrumentationHandler,
  consoleSandbox,
  logger,
} from '@stackreport/utils';

import { DEBUG_BUILD } from '../debug-build';

/** 退出前等待报告写完的默认时间（毫秒） */
export const DEFAULT_SHUTDOWN_TIMEOUT = 2000;

interface OnUncaughtExceptionOptions {
  /**
   * 进程上还注册了其他 uncaughtException 监听器时，Node 的默认行为是不退出，交给那些监听器处理。
   * 设为 true 时无论如何都在报告写完后退出进程
   * 默认为 false
   */
  exitEvenIfOtherHandlersAreRegistered: boolean;

  /**
   * 退出前等待报告写完的最长时间（毫秒）
   * 默认为 2000
   */
  timeout: number;

  /**
   * 报告写完（或超时）之后调用，默认打印错误并以退出码 1 结束进程
   */
  onFatalError(this: void, error: unknown): void;
}

const INTEGRATION_NAME = 'OnUncaughtException';

const _onUncaughtExceptionIntegration = ((
  options: Partial<OnUncaughtExceptionOptions> = {},
) => {
  const _options: OnUncaughtExceptionOptions = {
    exitEvenIfOtherHandlersAreRegistered: false,
    timeout: DEFAULT_SHUTDOWN_TIMEOUT,
    onFatalError: logAndExitProcess,
    ...options,
  };

  return {
    name: INTEGRATION_NAME,
    setup(client) {
      const handler = makeErrorHandler(client, _options);
      addGlobalErrorInstrumentationHandler((data) => {
        if (getClient() !== client) {
          return;
        }
        void handler(data);
      });
    },
  };
}) satisfies IntegrationFn;

/**
 * 为未捕获的错误生成报告，等待报告写完后结束进程
 */
export const onUncaughtExceptionIntegration = defineIntegration(
  _onUncaughtExceptionIntegration,
);

/**
 * 创建 uncaughtException 的处理函数
 *
 * 决定退出之后，写报告期间再出现的错误只记录日志，不再生成报告
 */
export function makeErrorHandler(
  client: Client,
  options: OnUncaughtExceptionOptions,
): (data: HandlerDataError) => Promise<void> {
  let exiting = false;

  return async ({ error }: HandlerDataError): Promise<void> => {
    if (exiting) {
      DEBUG_BUILD &&
        logger.warn(
          'uncaught exception after calling fatal error shutdown callback - this is bad! forcing shutdown',
        );
      return;
    }

    // 我们的监听器本身占一个，超过一个说明用户还注册了自己的处理逻辑
    const otherHandlersRegistered =
      process.listeners('uncaughtException').length > 1;
    const shouldExit =
      options.exitEvenIfOtherHandlersAreRegistered || !otherHandlersRegistered;

    if (shouldExit) {
      exiting = true;
    }

    // 不直接等待这次写入，timeout 要同时限制它和缓冲区中其他正在写入的报告
    void client.captureException(error).then(undefined, (e: unknown) => {
      DEBUG_BUILD &&
        logger.error('Failed to store uncaught exception report:', e);
    });

    const flushed = await client.flush(options.timeout);
    if (!flushed) {
      DEBUG_BUILD &&
        logger.warn(
          `Reports were not stored within ${options.timeout}ms of the uncaught exception.`,
        );
    }

    if (shouldExit) {
      options.onFatalError(error);
    }
  };
}

/**
 * 打印错误并以退出码 1 结束进程
 */
export function logAndExitProcess(error: unknown): void {
  consoleSandbox(() => {
    // eslint-disable-next-line no-console
    console.error(error);
  });

  process.exit(1);
}
