import type { FrameLocals, Traceback } from '@stackreport/types';

import { isMatchingPattern } from './string';

/**
 * 错误对象本身只有 `cause` 这一种显式的起因。
 * “处理一个错误的过程中又抛出了另一个错误”这种隐式的上下文关系，以及调用栈、局部变量这些
 * 运行时不提供的信息，都由协作方代码通过下面的函数挂到错误对象上。
 *
 * 这里统一用 WeakMap 保存，不修改错误对象本身，也不会阻止错误对象被回收。
 */
const errorContexts = new WeakMap<object, unknown>();
const attachedTracebacks = new WeakMap<object, Traceback>();
const frameAnnotations = new WeakMap<object, FrameAnnotationEntry[]>();

/**
 * 针对某一帧补充的信息
 */
export interface FrameAnnotation {
  /** 该帧的局部变量 */
  locals?: FrameLocals;
  /** 在报告中隐藏该帧 */
  hidden?: boolean;
}

interface FrameAnnotationEntry extends FrameAnnotation {
  functionName: string | RegExp;
}

/**
 * 返回错误显式声明的起因（`new Error(msg, { cause })`），没有时返回 undefined
 */
export function getExplicitCause(error: object): unknown {
  return 'cause' in error ? error.cause : undefined;
}

/**
 * 记录 error 是在处理 context 的过程中抛出的
 *
 * @example
 * ```ts
 * try {
 *   parse(input);
 * } catch (e) {
 *   const next = new Error('fallback failed');
 *   setErrorContext(next, e);
 *   throw next;
 * }
 * ```
 */
export function setErrorContext(error: object, context: unknown): void {
  errorContexts.set(error, context);
}

/**
 * 返回 error 的隐式上下文，没有时返回 undefined
 */
export function getErrorContext(error: object): unknown {
  return errorContexts.get(error);
}

/**
 * 给错误挂上一份显式的调用栈，优先于从 error.stack 中解析出的调用栈
 * 调用栈按调用顺序排列，最早的调用方在前
 */
export function attachTraceback(error: object, traceback: Traceback): void {
  attachedTracebacks.set(error, traceback);
}

/**
 * 返回通过 attachTraceback 挂上的调用栈
 */
export function getAttachedTraceback(error: object): Traceback | undefined {
  return attachedTracebacks.get(error);
}

/**
 * 为 error 调用栈中某个函数所在的帧补充局部变量，或者把它标记为隐藏
 *
 * 匹配的是离出错位置最近的同名帧。方法调用在 V8 中显示为 `Class.method`，只写方法名也能匹配
 *
 * @param error 目标错误
 * @param functionName 函数名或者匹配函数名的正则
 * @param annotation 要补充的信息
 */
export function annotateFrame(
  error: object,
  functionName: string | RegExp,
  annotation: FrameAnnotation,
): void {
  const entries = frameAnnotations.get(error) || [];
  entries.push({ ...annotation, functionName });
  frameAnnotations.set(error, entries);
}

/**
 * 把 annotateFrame 记录的信息应用到调用栈上，返回一份新的调用栈
 * 每条补充信息只应用到一个帧上，同一个函数多次补充时依次向外层匹配
 */
export function applyFrameAnnotations(
  error: object,
  traceback: Traceback,
): Traceback {
  const entries = frameAnnotations.get(error);
  if (!entries || !entries.length) {
    return traceback;
  }

  const frames = traceback.map((frame) => ({ ...frame }));
  const used = new Set<number>();

  for (const entry of entries) {
    for (let i = frames.length - 1; i >= 0; i--) {
      const frame = frames[i];
      if (!frame || used.has(i) || !matchesFunction(frame.function, entry.functionName)) {
        continue;
      }

      used.add(i);
      if (entry.locals) {
        frame.locals = entry.locals;
      }
      if (entry.hidden !== undefined) {
        frame.hidden = entry.hidden;
      }
      break;
    }
  }

  return frames;
}

function matchesFunction(name: string, pattern: string | RegExp): boolean {
  if (isMatchingPattern(name, pattern, true)) {
    return true;
  }
  return typeof pattern === 'string' && name.endsWith(`.${pattern}`);
}
