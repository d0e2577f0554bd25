import { isRegExp, isString } from './is';
import { safeDescribe } from './format';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

/**
 * 转义 HTML 特殊字符，让字符串可以安全地嵌入到 HTML 文本或属性中
 */
export function escapeHtml(str: string): string {
  return str.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] || char);
}

/**
 * 按行拆分文本，识别 \r\n、\r、\n 三种换行
 * 末尾的换行不会产生一个多余的空行
 */
export function splitLines(text: string): string[] {
  if (!text) {
    return [];
  }
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * 检查给定的字符串是否匹配一个特定的字符串或正则表达式
 *
 * @param value 需要测试的字符串
 * @param pattern 一个正则表达式或字符串，用于与 value 进行匹配
 * @param requireExactStringMatch 如果为 true，则要求 value 与字符串模式完全匹配
 * 如果为 false，则只要求 value 包含该模式。
 */
export function isMatchingPattern(
  value: string,
  pattern: RegExp | string,
  requireExactStringMatch: boolean = false,
): boolean {
  if (!isString(value)) {
    return false;
  }

  if (isRegExp(pattern)) {
    return pattern.test(value);
  }

  if (isString(pattern)) {
    return requireExactStringMatch
      ? value === pattern
      : value.includes(pattern);
  }

  return false;
}

/**
 * Join values in array
 * 单个值转换失败时用占位符代替，不会让整个拼接失败
 *
 * @param input array of values to be joined together
 * @param delimiter string to be placed in-between values
 * @returns Joined values
 */
export function safeJoin(input: unknown[], delimiter?: string): string {
  if (!Array.isArray(input)) {
    return '';
  }

  const output: string[] = [];
  for (const value of input) {
    output.push(isString(value) ? value : safeDescribe(value));
  }

  return output.join(delimiter);
}
