/** console 上可以被插桩的日志级别 */
export type ConsoleLevel =
  | 'debug'
  | 'info'
  | 'warn'
  | 'error'
  | 'log'
  | 'assert'
  | 'trace';

/**
 * console 方法被调用时传给处理器的数据
 */
export interface HandlerDataConsole {
  level: ConsoleLevel;
  args: unknown[];
}

/**
 * 进程级错误（uncaughtException）传给处理器的数据
 */
export interface HandlerDataError {
  error: unknown;
  /** Node 传入的来源，`uncaughtException` 或 `unhandledRejection` */
  origin: string;
}

/**
 * 未处理的 Promise 拒绝传给处理器的数据
 */
export interface HandlerDataUnhandledRejection {
  reason: unknown;
  promise: Promise<unknown>;
}
