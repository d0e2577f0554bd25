import type {
  OriginModuleKind,
  ReportFrame,
  ReporterOptions,
  StackParser,
  Traceback,
} from '@stackreport/types';
import {
  applyFrameAnnotations,
  createStackParser,
  getAttachedTraceback,
  getErrorContext,
  getExplicitCause,
  getModuleFromFilename,
  isError,
  logger,
  nodeStackLineParser,
} from '@stackreport/utils';

import { DEBUG_BUILD } from './debug-build';
import { DEFAULT_CONTEXT_LINES, getLinesFromFile } from './frames';

/** 错误链最多遍历的错误数量 */
export const MAX_CHAIN_LENGTH = 50;

/** 模块名以这些前缀开头的帧归类为 framework */
export const DEFAULT_FRAMEWORK_MODULE_PREFIXES: readonly string[] = [
  'node:',
  'node_modules/',
];

export const defaultStackParser: StackParser = createStackParser(
  nodeStackLineParser(),
);

/** 一个错误的起因 */
export interface ErrorCause {
  cause: unknown;
  /** 起因来自 `cause`，而不是处理另一个错误时记录下的上下文 */
  explicit: boolean;
}

/**
 * 返回错误的起因：优先使用显式的 `cause`，没有时使用隐式的上下文
 */
export function getErrorCause(error: object): ErrorCause {
  const explicit = getExplicitCause(error);
  if (explicit !== undefined && explicit !== null) {
    return { cause: explicit, explicit: true };
  }
  return { cause: getErrorContext(error), explicit: false };
}

/**
 * 从最外层的错误开始沿着起因收集错误链，最外层在前，根因在最后
 *
 * 只有 Error 才会被继续追踪；遇到重复出现的错误（环）或者超过 MAX_CHAIN_LENGTH 时停止
 */
export function getExceptionChain(exception: unknown): Error[] {
  const chain: Error[] = [];
  const seen = new Set<Error>();

  let current = exception;
  while (isError(current)) {
    if (seen.has(current)) {
      DEBUG_BUILD && logger.warn('Cause cycle detected, stopping the chain walk.');
      break;
    }
    if (chain.length >= MAX_CHAIN_LENGTH) {
      DEBUG_BUILD &&
        logger.warn(
          `Exception chain is longer than ${MAX_CHAIN_LENGTH}, remaining causes are ignored.`,
        );
      break;
    }

    seen.add(current);
    chain.push(current);
    current = getErrorCause(current).cause;
  }

  return chain;
}

/**
 * 返回错误自身的调用栈
 *
 * 通过 attachTraceback 挂上的调用栈优先，否则解析 error.stack。
 * 最后应用 annotateFrame 记录的局部变量和隐藏标记
 */
export function getErrorTraceback(
  error: Error,
  stackParser: StackParser = defaultStackParser,
): Traceback | undefined {
  let traceback = getAttachedTraceback(error);

  if (!traceback) {
    const stack: unknown = error.stack;
    if (typeof stack !== 'string' || !stack) {
      return undefined;
    }
    traceback = stackParser(stack);
  }

  return applyFrameAnnotations(error, traceback);
}

/**
 * 按模块名前缀给帧分类
 */
export function getOriginModuleKind(
  module: string,
  prefixes: readonly string[] = DEFAULT_FRAMEWORK_MODULE_PREFIXES,
): OriginModuleKind {
  return prefixes.some((prefix) => module.startsWith(prefix))
    ? 'framework'
    : 'user';
}

/**
 * 遍历整个错误链，返回报告中的全部帧
 *
 * 根因最先处理，之后依次是由它引起的外层错误，每个错误自身的帧按调用顺序排列。
 * 错误链中只有一个错误时，调用方显式提供的 traceback 优先于错误自身的调用栈。
 * 没有调用栈的错误不贡献任何帧，遍历继续处理下一个错误。
 *
 * 返回的帧中局部变量还是原始值，由 ExceptionReporter 统一渲染
 *
 * @param exception 最外层的错误，undefined 表示没有错误
 * @param traceback 显式提供的调用栈
 */
export function getTracebackFrames(
  exception: unknown,
  traceback?: Traceback,
  options: ReporterOptions = {},
): ReportFrame[] {
  const chain = getExceptionChain(exception);
  const frames: ReportFrame[] = [];
  if (!chain.length) {
    return frames;
  }

  const {
    contextLines = DEFAULT_CONTEXT_LINES,
    frameworkModulePrefixes = DEFAULT_FRAMEWORK_MODULE_PREFIXES,
    defaultSourceEncoding,
    sourceLoader,
    stackParser,
  } = options;

  let frameIdentity = 0;

  // 根因在链的末尾
  for (let i = chain.length - 1; i >= 0; i--) {
    const error = chain[i];
    if (!error) {
      continue;
    }

    const records =
      chain.length === 1 && traceback
        ? traceback
        : getErrorTraceback(error, stackParser);
    if (!records) {
      DEBUG_BUILD &&
        logger.log(`No traceback available for ${error.name}, skipping it.`);
      continue;
    }

    // 同一个错误的所有帧共享这个错误的起因
    const { cause, explicit } = getErrorCause(error);

    for (const record of records) {
      if (record.hidden) {
        continue;
      }

      // 运行时记录的行号从 1 开始，读取源码时使用从 0 开始的下标
      const lineno = record.lineno - 1;
      const module =
        record.module || getModuleFromFilename(record.filename) || '';

      const lines = getLinesFromFile(record.filename, lineno, contextLines, {
        loader: record.loader || sourceLoader,
        moduleName: module,
        defaultEncoding: defaultSourceEncoding,
      });

      // 拿不到源码的帧不出现在报告中
      if (lines.preStartLine === undefined || lines.current === undefined) {
        continue;
      }

      frames.push({
        filename: record.filename,
        function_name: record.function,
        line_number: lineno + 1,
        source_context: {
          pre_lines: lines.pre,
          current_line: lines.current,
          post_lines: lines.post,
          pre_start_line: lines.preStartLine,
        },
        locals: record.locals.map(([name, value]) => [name, value]),
        module,
        origin_module_kind: getOriginModuleKind(module, frameworkModulePrefixes),
        cause_exception: cause,
        cause_is_explicit: explicit,
        frame_identity: ++frameIdentity,
      });
    }
  }

  return frames;
}
