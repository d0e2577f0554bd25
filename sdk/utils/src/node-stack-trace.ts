import { extname, isAbsolute, relative, sep } from 'node:path';
import { fileURLToPath } from 'node:url';

import type { StackFrameRecord, StackLineParser } from '@stackreport/types';

import { UNKNOWN_FUNCTION } from './stacktrace';

/**
 * 匹配 V8 的堆栈行，例如:
 *
 *   at Object.<anonymous> (/app/src/index.js:10:15)
 *   at async run (file:///app/src/index.mjs:3:9)
 *   at /app/src/index.js:10:15
 *
 * 没有行列号的行（`at new Promise (<anonymous>)`）不会被匹配
 */
const FULL_MATCH =
  /^\s*at (?:async )?(?:(.+?) \((?:address at )?)?(.*?):(\d+):(\d+)\)?\s*$/;

const NODE_MODULES = '/node_modules/';

/**
 * 根据文件名推断模块名
 *
 * - `node:` 开头的内部模块原样返回
 * - node_modules 中的文件返回 `node_modules/<包内路径>`，不带扩展名
 * - 当前工作目录下的文件返回相对路径，不带扩展名
 * - 其余绝对路径去掉扩展名后返回
 */
export function getModuleFromFilename(
  filename: string | undefined,
  cwd: string = process.cwd(),
): string | undefined {
  if (!filename) {
    return undefined;
  }

  if (filename.startsWith('node:')) {
    return filename;
  }

  // <anonymous>、evalmachine.<anonymous> 这类不是文件
  if (!isAbsolute(filename)) {
    return filename;
  }

  const normalized = filename.split(sep).join('/');
  const withoutExt = stripExtension(normalized);

  const nodeModulesIndex = withoutExt.lastIndexOf(NODE_MODULES);
  if (nodeModulesIndex > -1) {
    return `node_modules/${withoutExt.slice(nodeModulesIndex + NODE_MODULES.length)}`;
  }

  const rel = relative(cwd, filename);
  if (rel && !rel.startsWith('..') && !isAbsolute(rel)) {
    return stripExtension(rel.split(sep).join('/'));
  }

  return withoutExt;
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext ? path.slice(0, -ext.length) : path;
}

/**
 * 把 `file://` URL 转为文件路径，其余原样返回
 */
function normalizeFilename(filename: string): string {
  if (!filename.startsWith('file://')) {
    return filename;
  }
  try {
    return fileURLToPath(filename);
  } catch (_e) {
    return filename;
  }
}

/**
 * 解析单行 V8 堆栈
 */
export function node(line: string): StackFrameRecord | undefined {
  const lineMatch = line.match(FULL_MATCH);
  if (!lineMatch) {
    return undefined;
  }

  const [, functionName, rawFilename, lineno, colno] = lineMatch;
  if (!rawFilename || !lineno) {
    return undefined;
  }

  const filename = normalizeFilename(rawFilename);

  return {
    filename,
    function: functionName || UNKNOWN_FUNCTION,
    lineno: parseInt(lineno, 10),
    colno: colno ? parseInt(colno, 10) : undefined,
    module: getModuleFromFilename(filename),
    locals: [],
  };
}

/**
 * Node 的堆栈行解析器
 */
export function nodeStackLineParser(): StackLineParser {
  return [90, node];
}
