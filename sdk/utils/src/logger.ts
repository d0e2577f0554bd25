import type { ConsoleLevel } from '@stackreport/types';

import { DEBUG_BUILD } from './debug-build';
import { GLOBAL_OBJ, getGlobalSingleton } from './worldwide';

/** 日志前缀 */
const PREFIX = 'StackReport Logger ';

/**
 * 日志函数类型，接受不定数量的参数，参数类型不确定，可以是任意类型
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type LoggerMethod = (...args: any[]) => void;
/**
 * 每个日志级别映射一个日志处理函数
 */
type LoggerConsoleMethods = Record<ConsoleLevel, LoggerMethod>;

/** SDK 内部使用的调试日志 */
export interface Logger extends LoggerConsoleMethods {
  disable(): void;
  enable(): void;
  isEnabled(): boolean;
}

export const CONSOLE_LEVELS: readonly ConsoleLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'log',
  'assert',
  'trace',
];

/**
 * 保存被插桩之前的 console 方法
 * console 插桩会往这里写入原始方法，consoleSandbox 借助它临时还原 console
 */
export const originalConsoleMethods: {
  [key in ConsoleLevel]?: LoggerMethod;
} = {};

/**
 * 临时禁用 console 插桩，在原始的 console 方法下运行给定的回调函数。
 * SDK 自己输出日志时必须经过这里，否则会被 console 插桩再次捕获，形成递归。
 *
 * @param callback 一个不带参数并返回类型 T 的函数。该函数将在控制台的原始状态下执行
 * @returns The results of the callback
 */
export function consoleSandbox<T>(callback: () => T): T {
  // 首先检查全局js对象 中是否存在 console
  if (!('console' in GLOBAL_OBJ)) {
    return callback();
  }

  const console = GLOBAL_OBJ.console;
  // 存储当前控制台方法的实现（可能是插桩后的版本）
  const wrappedFuncs: Partial<LoggerConsoleMethods> = {};

  // 获取所有被插桩过的控制台级别
  const wrappedLevels = CONSOLE_LEVELS.filter(
    (level) => originalConsoleMethods[level] !== undefined,
  );

  // Restore all wrapped console methods
  wrappedLevels.forEach((level) => {
    const originalConsoleMethod = originalConsoleMethods[level];
    if (!originalConsoleMethod) {
      return;
    }

    wrappedFuncs[level] = console[level];
    console[level] = originalConsoleMethod;
  });

  try {
    return callback();
  } finally {
    // 将所有控制台方法恢复为插桩后的状态，即使回调抛出错误也不会让 console 停留在原始状态
    wrappedLevels.forEach((level) => {
      const wrapped = wrappedFuncs[level];
      if (wrapped) {
        console[level] = wrapped;
      }
    });
  }
}

function makeLogger(): Logger {
  let enabled = false;

  const makeMethod =
    (level: ConsoleLevel): LoggerMethod =>
    (...args) => {
      if (!DEBUG_BUILD || !enabled) {
        return;
      }
      consoleSandbox(() => {
        GLOBAL_OBJ.console[level](`${PREFIX}[${level}]:`, ...args);
      });
    };

  return {
    enable: () => {
      enabled = true;
    },
    disable: () => {
      enabled = false;
    },
    isEnabled: () => enabled,
    debug: makeMethod('debug'),
    info: makeMethod('info'),
    warn: makeMethod('warn'),
    error: makeMethod('error'),
    log: makeMethod('log'),
    assert: makeMethod('assert'),
    trace: makeMethod('trace'),
  };
}

/**
 * 这是一个日志记录器单例，它可以是一个功能完整的日志记录器，也可以是一个无操作的日志记录器
 * 默认是禁用的，`debug: true` 时由 initAndBind 启用
 */
export const logger = getGlobalSingleton('logger', makeLogger);
