import type { ReportFrame } from '@stackreport/types';

/** 纯文本调用栈的第一行 */
export const TRACEBACK_HEADER = 'Traceback (most recent call last):\n';

/**
 * 把帧格式化为纯文本调用栈的条目，每一帧一个条目：
 *
 * ```
 *   File "/app/src/index.js", line 10, in main
 *     run();
 * ```
 *
 * 出错行为空白时只有第一行
 */
export function formatFrames(
  frames: ReadonlyArray<Pick<ReportFrame, 'filename' | 'line_number' | 'function_name' | 'source_context'>>,
): string[] {
  return frames.map((frame) => {
    let entry = `  File "${frame.filename}", line ${frame.line_number}, in ${frame.function_name}\n`;
    const line = frame.source_context.current_line.trim();
    if (line) {
      entry += `    ${line}\n`;
    }
    return entry;
  });
}

/**
 * 错误本身的一行描述，形如 `TypeError: x is not a function`
 * 没有错误信息时只有类型名
 */
export function formatExceptionOnly(
  type: string | undefined,
  value: string | undefined,
): string[] {
  if (type === undefined) {
    return [];
  }
  return [value ? `${type}: ${value}\n` : `${type}\n`];
}
