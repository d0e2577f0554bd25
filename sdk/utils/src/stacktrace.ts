import type {
  StackFrameRecord,
  StackLineParser,
  StackParser,
} from '@stackreport/types';

/**
 * 这个常量定义了一个限制，即最多只会处理 50 个堆栈帧。
 * 堆栈可能非常深，为了防止处理过多堆栈帧而导致性能问题，限制了堆栈帧的数量。
 */
const STACKTRACE_FRAME_LIMIT = 50;

/**
 * 当无法解析堆栈跟踪中的某个函数名时，将用 ? 作为占位符
 */
export const UNKNOWN_FUNCTION = '?';

/**
 * 这是一个用于清理 Webpack 错误的正则表达式
 * Webpack 在某些情况下会将错误包装在类似 (error: some error message) 的字符串中
 */
const WEBPACK_ERROR_REGEXP = /\(error: (.*)\)/;

/**
 * 这个函数用于创建一个 StackParser，它接受一堆堆栈行解析器
 *
 * 返回的帧按调用顺序排列，最早的调用方在前，出错位置在最后
 */
export function createStackParser(...parsers: StackLineParser[]): StackParser {
  // 对 parsers 进行排序（根据每个解析器的优先级），并提取出解析器函数
  const sortedParsers = parsers.sort((a, b) => a[0] - b[0]).map((p) => p[1]);

  return (
    stack: string,
    skipFirstLines: number = 0,
    framesToPop: number = 0,
  ): StackFrameRecord[] => {
    const frames: StackFrameRecord[] = [];
    const lines = stack.split('\n');

    for (let i = skipFirstLines; i < lines.length; i++) {
      const line = lines[i];
      // 超过 1kb 的行几乎不可能是堆栈帧，而且对超长字符串做回溯正则匹配可能导致卡死
      if (line === undefined || line.length > 1024) {
        continue;
      }

      // Remove webpack (error: *) wrappers
      const cleanedLine = WEBPACK_ERROR_REGEXP.test(line)
        ? line.replace(WEBPACK_ERROR_REGEXP, '$1')
        : line;

      // 跳过 `TypeError: xxx` 这样的错误标题行
      if (cleanedLine.match(/\S*Error: /)) {
        continue;
      }

      for (const parser of sortedParsers) {
        const frame = parser(cleanedLine);
        if (frame) {
          frames.push(frame);
          break;
        }
      }

      if (frames.length >= STACKTRACE_FRAME_LIMIT + framesToPop) {
        break;
      }
    }

    return reverseStackFrames(frames.slice(framesToPop));
  };
}

/**
 * 将堆栈的顺序反转，保证返回的数组中最早的调用方在最前面，出错的位置是最后一个元素。
 * 同时补全缺失的文件名和函数名
 * @hidden
 */
export function reverseStackFrames(
  stack: ReadonlyArray<StackFrameRecord>,
): StackFrameRecord[] {
  if (!stack.length) {
    return [];
  }

  // 复制一份，避免直接修改传入的原始数组
  const localStack = Array.from(stack).reverse();
  const fallbackFilename = getLastStackFrame(localStack).filename;

  return localStack.slice(0, STACKTRACE_FRAME_LIMIT).map((frame) => ({
    ...frame,
    filename: frame.filename || fallbackFilename,
    function: frame.function || UNKNOWN_FUNCTION,
  }));
}

function getLastStackFrame(arr: StackFrameRecord[]): StackFrameRecord {
  return (
    arr[arr.length - 1] || {
      filename: '',
      function: '',
      lineno: 0,
      locals: [],
    }
  );
}

const defaultFunctionName = '<anonymous>';

/**
 * 安全地从自身提取函数名
 */
export function getFunctionName(fn: unknown): string {
  try {
    if (!fn || typeof fn !== 'function') {
      return defaultFunctionName;
    }
    return fn.name || defaultFunctionName;
  } catch (e) {
    return defaultFunctionName;
  }
}
