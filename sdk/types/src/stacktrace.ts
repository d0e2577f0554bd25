import type { StackFrameRecord } from './stackframe';

/**
 * 一个错误的调用栈，按调用顺序从最早的调用方到出错位置依次排列
 * 最后一个元素就是抛出错误的那一帧
 */
export type Traceback = StackFrameRecord[];

/**
 * 用于解析堆栈字符串并返回一个 StackFrameRecord 对象的数组
 */
export type StackParser = (
  // 需要解析的堆栈字符串
  stack: string,
  // 表示在解析堆栈时应该跳过的行数
  skipFirstLines?: number,
  // 表示需要从最终结果中删除的帧数，通常用于调整堆栈的准确性。
  framesToPop?: number,
) => StackFrameRecord[];

/**
 * 用于解析堆栈中的一行，并返回一个 StackFrameRecord 对象, 如果无法解析该行则返回 undefined。
 */
export type StackLineParserFn = (line: string) => StackFrameRecord | undefined;

/**
 * 一个元组类型
 * 第一个元素是一个数字，表示优先级或解析顺序
 * 第二个元素是一个 StackLineParserFn 函数，用于解析堆栈中的一行
 */
export type StackLineParser = [number, StackLineParserFn];
