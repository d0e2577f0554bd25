import { readFileSync } from 'node:fs';

import type { FrameLocals, SourceLoader } from '@stackreport/types';
import {
  decodeBytes,
  detectSourceEncoding,
  escapeHtml,
  isBytes,
  logger,
  safeFormat,
  splitByteLines,
  splitLines,
} from '@stackreport/utils';

import { DEBUG_BUILD } from './debug-build';

/** 出错行上下各取的行数 */
export const DEFAULT_CONTEXT_LINES = 7;

/** 单个局部变量渲染结果的长度上限 */
export const MAX_VARIABLE_LENGTH = 4096;

/**
 * 出错行附近的源码
 * 源码不可用时 preStartLine 和 current 都是 undefined，pre/post 为空数组
 */
export interface SourceLines {
  /** pre 第一行的行号，从 1 开始 */
  preStartLine: number | undefined;
  pre: string[];
  current: string | undefined;
  post: string[];
}

export interface GetLinesFromFileOptions {
  /** 优先使用的源码加载器 */
  loader?: SourceLoader;
  /** 传给加载器的模块名 */
  moduleName?: string;
  /** 文件没有编码声明时使用的编码，默认为 ascii */
  defaultEncoding?: string;
}

function unavailable(): SourceLines {
  return { preStartLine: undefined, pre: [], current: undefined, post: [] };
}

/**
 * 读取出错行前后各 contextLines 行源码
 *
 * 源码优先从加载器获取，加载器不可用时从磁盘读取原始字节并按文件声明的编码解码。
 * 拿不到源码（文件不存在、读取失败、编码不认识）或者行号超出范围时返回不可用，不会抛出异常
 *
 * @param filename 文件路径
 * @param lineno 出错行的下标，从 0 开始
 * @param contextLines 上下各取多少行
 */
export function getLinesFromFile(
  filename: string,
  lineno: number,
  contextLines: number = DEFAULT_CONTEXT_LINES,
  options: GetLinesFromFileOptions = {},
): SourceLines {
  const source = loadSource(filename, options);
  if (!source || lineno < 0 || lineno >= source.length) {
    return unavailable();
  }

  const lowerBound = Math.max(0, lineno - contextLines);
  const upperBound = lineno + contextLines;

  return {
    preStartLine: lowerBound + 1,
    pre: source.slice(lowerBound, lineno),
    current: source[lineno],
    post: source.slice(lineno + 1, upperBound),
  };
}

function loadSource(
  filename: string,
  { loader, moduleName = '', defaultEncoding }: GetLinesFromFileOptions,
): string[] | undefined {
  if (loader) {
    try {
      const text = loader.getSource(moduleName);
      if (text !== undefined) {
        return splitLines(text);
      }
    } catch (e) {
      DEBUG_BUILD &&
        logger.log(`Source loader failed for module "${moduleName}":`, e);
    }
  }

  let bytes: Uint8Array;
  try {
    bytes = readFileSync(filename);
  } catch (_e) {
    return undefined;
  }

  const lines = splitByteLines(bytes);
  const encoding = detectSourceEncoding(lines, defaultEncoding);

  try {
    return lines.map((line) => decodeBytes(line, encoding, 'replace'));
  } catch (e) {
    DEBUG_BUILD &&
      logger.warn(`Cannot decode ${filename} as "${encoding}":`, e);
    return undefined;
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/**
 * 把一个局部变量渲染为可以直接嵌入 HTML 的字符串
 *
 * 格式化失败时使用格式化过程中抛出的错误的描述；
 * 字节结果按 UTF-8 解码；超过 4096 个字符的结果会被截断并标注原始长度；最后做一次 HTML 转义
 */
export function renderFrameVariable(
  value: unknown,
  formatValue?: (value: unknown) => string | Uint8Array,
): string {
  const formatted = safeFormat(value, formatValue);
  let text = isBytes(formatted)
    ? new TextDecoder('utf-8').decode(formatted)
    : formatted;

  if (text.length > MAX_VARIABLE_LENGTH) {
    let end = MAX_VARIABLE_LENGTH;
    // 不把代理对从中间切开
    if (isHighSurrogate(text.charCodeAt(end - 1))) {
      end -= 1;
    }
    text = `${text.slice(0, end)}... <trimmed ${text.length} bytes string>`;
  }

  return escapeHtml(text);
}

/**
 * 按顺序渲染一帧的全部局部变量
 */
export function renderFrameVars(
  locals: FrameLocals,
  formatValue?: (value: unknown) => string | Uint8Array,
): Array<[string, string]> {
  return locals.map(([name, value]) => [
    name,
    renderFrameVariable(value, formatValue),
  ]);
}
