import type { CaptureHint, LogRecord } from '@stackreport/types';
import { logger } from '@stackreport/utils';

import { DEBUG_BUILD } from './debug-build';
import { getClient } from './sdk';

/**
 * 使用当前客户端为一个错误生成报告并存储
 *
 * @param exception 要捕获的错误，undefined 表示没有错误，会生成一份空报告
 * @param hint 显式提供的调用栈、触发这次捕获的日志内容
 * @returns 报告存储的位置，没有客户端时为 undefined
 */
export function captureException(
  exception: unknown,
  hint?: CaptureHint,
): Promise<string | undefined> {
  const client = getClient();
  if (!client) {
    DEBUG_BUILD &&
      logger.warn('Cannot capture exception: SDK has not been initialized.');
    return Promise.resolve(undefined);
  }
  return client.captureException(exception, hint);
}

/**
 * 使用当前客户端为一条日志记录生成报告
 */
export function captureLogRecord(
  record: LogRecord,
): Promise<string | undefined> {
  const client = getClient();
  if (!client) {
    DEBUG_BUILD &&
      logger.warn('Cannot capture log record: SDK has not been initialized.');
    return Promise.resolve(undefined);
  }
  return client.captureLogRecord(record);
}

/**
 * 等待当前客户端正在写入的报告全部完成
 *
 * @param timeout 最长等待时间（毫秒）
 * @returns 超时或者没有客户端时为 false
 */
export async function flush(timeout?: number): Promise<boolean> {
  const client = getClient();
  if (client) {
    return client.flush(timeout);
  }
  DEBUG_BUILD && logger.warn('Cannot flush events. No client defined.');
  return Promise.resolve(false);
}
