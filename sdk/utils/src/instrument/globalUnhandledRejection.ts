import type { HandlerDataUnhandledRejection } from '@stackreport/types';

import { addHandler, maybeInstrument, triggerHandlers } from './handlers';

/**
 * 监听进程的 unhandledRejection 事件，把未处理的 Promise 拒绝传递给处理程序
 *
 * 只在内部使用
 * @hidden
 */
export function addGlobalUnhandledRejectionInstrumentationHandler(
  handler: (data: HandlerDataUnhandledRejection) => void,
): void {
  // 用于处理捕获到的未处理拒绝事件
  const type = 'unhandledrejection';
  addHandler(type, handler);
  maybeInstrument(type, instrumentUnhandledRejection);
}

/**
 * 实际进行插桩的函数
 *
 * @link {instrumentError}
 */
function instrumentUnhandledRejection(): void {
  process.on(
    'unhandledRejection',
    (reason: unknown, promise: Promise<unknown>) => {
      triggerHandlers('unhandledrejection', { reason, promise });
    },
  );
}
