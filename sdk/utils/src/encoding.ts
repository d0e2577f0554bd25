import { DecodingError } from './error';

/**
 * 源码文件中的编码声明，例如 `# -*- coding: latin-1 -*-`、`// vim: set fileencoding=utf-8 :`
 * 只在文件的前两行中查找
 */
const CODING_REGEXP = /coding[:=]\s*([-\w.]+)/;

const LF = 0x0a;
const CR = 0x0d;

/** 常见编码别名到内部名称的映射 */
const ENCODING_ALIASES: Record<string, string> = {
  'ascii': 'ascii',
  'us-ascii': 'ascii',
  '646': 'ascii',
  'latin1': 'latin1',
  'latin-1': 'latin1',
  'iso-8859-1': 'latin1',
  'iso8859-1': 'latin1',
  'iso-latin-1': 'latin1',
  'l1': 'latin1',
  '8859': 'latin1',
  'cp819': 'latin1',
  'utf-8': 'utf-8',
  'utf8': 'utf-8',
  'u8': 'utf-8',
  'utf': 'utf-8',
  'utf-8-sig': 'utf-8',
};

/**
 * 把编码名规范化为内部名称
 * 不认识的编码返回 undefined
 */
export function normalizeEncoding(encoding: string): string | undefined {
  const name = encoding.trim().toLowerCase().replace(/_/g, '-');
  const alias = ENCODING_ALIASES[name];
  if (alias) {
    return alias;
  }

  // 其余编码交给 TextDecoder，它不认识的编码名会抛出 RangeError
  try {
    return new TextDecoder(name).encoding;
  } catch (_e) {
    return undefined;
  }
}

/**
 * 按换行拆分字节，识别 \r\n、\r、\n，结果中不包含换行符
 */
export function splitByteLines(bytes: Uint8Array): Uint8Array[] {
  const lines: Uint8Array[] = [];
  let start = 0;

  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    if (byte !== LF && byte !== CR) {
      continue;
    }

    lines.push(bytes.subarray(start, i));
    // \r\n 算作一个换行
    if (byte === CR && bytes[i + 1] === LF) {
      i++;
    }
    start = i + 1;
  }

  // 最后一行没有换行结尾
  if (start < bytes.length) {
    lines.push(bytes.subarray(start));
  }

  return lines;
}

/**
 * 从前两行中检测源码的编码声明
 *
 * @param lines 按行拆分后的源码字节
 * @param defaultEncoding 没有编码声明时使用的编码
 * @returns 声明的编码名（未经规范化）
 */
export function detectSourceEncoding(
  lines: Uint8Array[],
  defaultEncoding: string = 'ascii',
): string {
  for (const line of lines.slice(0, 2)) {
    // latin1 把每个字节一一映射为一个字符，用来在字节上做正则匹配
    const match = CODING_REGEXP.exec(Buffer.from(line).toString('latin1'));
    if (match && match[1]) {
      return match[1];
    }
  }
  return defaultEncoding;
}

/**
 * 按指定编码解码字节
 *
 * @param bytes 要解码的字节
 * @param encoding 编码名
 * @param errors `replace` 时无法解码的字节替换为 U+FFFD，`strict` 时抛出 DecodingError
 * @throws RangeError 编码名无法识别
 */
export function decodeBytes(
  bytes: Uint8Array,
  encoding: string,
  errors: 'replace' | 'strict' = 'replace',
): string {
  const normalized = normalizeEncoding(encoding);
  if (!normalized) {
    throw new RangeError(`unknown encoding: ${encoding}`);
  }

  if (normalized === 'ascii') {
    return decodeAscii(bytes, errors);
  }

  if (normalized === 'latin1') {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
      'latin1',
    );
  }

  try {
    return new TextDecoder(normalized, { fatal: errors === 'strict' }).decode(
      bytes,
    );
  } catch (e) {
    throw new DecodingError(
      encoding,
      bytes,
      0,
      bytes.length,
      e instanceof Error ? e.message : 'invalid data',
    );
  }
}

function decodeAscii(bytes: Uint8Array, errors: 'replace' | 'strict'): string {
  let result = '';
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    if (byte === undefined) {
      break;
    }
    if (byte > 0x7f) {
      if (errors === 'strict') {
        throw new DecodingError(
          'ascii',
          bytes,
          i,
          i + 1,
          'ordinal not in range(128)',
        );
      }
      result += '\uFFFD';
      continue;
    }
    result += String.fromCharCode(byte);
  }
  return result;
}
