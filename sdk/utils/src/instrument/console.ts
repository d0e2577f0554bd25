import type { ConsoleLevel, HandlerDataConsole } from '@stackreport/types';

import { CONSOLE_LEVELS, originalConsoleMethods } from '../logger';
import { fill } from '../object';
import { GLOBAL_OBJ } from '../worldwide';
import { addHandler, maybeInstrument, triggerHandlers } from './handlers';

/**
 * 注册一个 console 处理器，每次调用 console 的方法时都会收到日志级别和参数
 * 第一次注册时才会对 console 插桩
 *
 * 只在内部使用
 * @hidden
 */
export function addConsoleInstrumentationHandler(
  handler: (data: HandlerDataConsole) => void,
): void {
  const type = 'console';
  addHandler(type, handler);
  maybeInstrument(type, instrumentConsole);
}

/**
 * 用包装后的方法替换 console 上的各个日志方法
 * 包装方法先通知处理器，再调用原始方法，console 原本的输出不受影响
 */
function instrumentConsole(): void {
  if (!('console' in GLOBAL_OBJ)) {
    return;
  }

  CONSOLE_LEVELS.forEach((level: ConsoleLevel): void => {
    if (!(level in GLOBAL_OBJ.console)) {
      return;
    }

    fill(GLOBAL_OBJ.console, level, (originalConsoleMethod) => {
      originalConsoleMethods[level] = originalConsoleMethod;

      return function (...args: unknown[]): void {
        const handlerData: HandlerDataConsole = { args, level };
        triggerHandlers('console', handlerData);

        const log = originalConsoleMethods[level];
        log && log.apply(GLOBAL_OBJ.console, args);
      };
    });
  });
}
