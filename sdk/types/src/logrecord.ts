import type { ConsoleLevel } from './instrument';
import type { Traceback } from './stacktrace';

/**
 * 一条日志记录，日志框架集成通过它触发报告生成
 */
export interface LogRecord {
  level: ConsoleLevel;
  /** 日志内容 */
  message: string;
  /** 与这条日志关联的错误，没有时生成一份空报告 */
  error?: unknown;
  /** 显式提供的调用栈，优先于从 error 中解析出的调用栈 */
  traceback?: Traceback;
}
