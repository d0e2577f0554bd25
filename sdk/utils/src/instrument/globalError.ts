import type { HandlerDataError } from '@stackreport/types';

import { addHandler, maybeInstrument, triggerHandlers } from './handlers';

/**
 * 通过监听进程的 uncaughtException 事件，把未捕获的错误传递给指定的处理程序（handler）
 *
 * 注意：注册了 uncaughtException 监听器之后 Node 不会再自动退出进程，
 * 是否退出由处理程序决定
 * 只在内部使用
 * @hidden
 */
export function addGlobalErrorInstrumentationHandler(
  handler: (data: HandlerDataError) => void,
): void {
  const type = 'error';
  addHandler(type, handler);
  maybeInstrument(type, instrumentError);
}

function instrumentError(): void {
  process.on('uncaughtException', (error: Error, origin: string) => {
    triggerHandlers('error', { error, origin });
  });
}
