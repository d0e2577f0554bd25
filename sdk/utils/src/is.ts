const objectToString = Object.prototype.toString;

/**
 * 用于检查一个给定的值是否是特定内置类（如 Array、Date、RegExp 等）
 *
 * @param wat The value to be checked
 * @param className
 * @returns A boolean representing the result.
 */
function isBuiltin(wat: unknown, className: string): boolean {
  return objectToString.call(wat) === `[object ${className}]`;
}

/**
 * Checks whether given value's type is a string
 *
 * @param wat A value to be checked.
 * @returns A boolean representing the result.
 */
export function isString(wat: unknown): wat is string {
  return isBuiltin(wat, 'String');
}

/**
 * Checks whether given value's type is an regexp
 *
 * @param wat A value to be checked.
 * @returns A boolean representing the result.
 */
export function isRegExp(wat: unknown): wat is RegExp {
  return isBuiltin(wat, 'RegExp');
}

/**
 * 检查给定值的类型是否为所提供构造函数的实例
 * instanceof 在一些代理对象上会抛出异常，这里统一视为 false
 *
 * @param wat A value to be checked.
 * @param base A constructor to be used in a check.
 * @returns A boolean representing the result.
 */
export function isInstanceOf<T>(
  wat: unknown,
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  base: abstract new (...args: any[]) => T,
): wat is T {
  try {
    return wat instanceof base;
  } catch (_e) {
    return false;
  }
}

/**
 * 检查给定值的类型是否为Error或Error-like类型之一
 *
 * @param wat A value to be checked.
 * @returns A boolean representing the result.
 */
export function isError(wat: unknown): wat is Error {
  switch (objectToString.call(wat)) {
    case '[object Error]':
    case '[object Exception]':
    case '[object DOMException]':
      return true;
    default:
      return isInstanceOf(wat, Error);
  }
}

/**
 * 检查给定值是否为字节数组（Buffer 也是 Uint8Array）
 */
export function isBytes(wat: unknown): wat is Uint8Array {
  return isInstanceOf(wat, Uint8Array);
}

/** 暴露出错位置的编解码错误 */
export interface TextCodecErrorLike extends Error {
  object: Uint8Array | string;
  start: number;
  end: number;
}

/**
 * 检查给定值是否是编解码错误，并且带有出错数据及出错区间
 *
 * 除了 utils 中的 DecodingError / EncodingError，
 * 任何名字形如 XxxDecodeError、XxxEncodingError 且带有 start/end/object 的错误都认为是编解码错误
 */
export function isTextCodecError(wat: unknown): wat is TextCodecErrorLike {
  if (!isError(wat) || !/(?:Decod|Encod|Unicode)\w*Error$/.test(wat.name)) {
    return false;
  }

  if (!('start' in wat) || !('end' in wat) || !('object' in wat)) {
    return false;
  }

  return (
    typeof wat.start === 'number' &&
    typeof wat.end === 'number' &&
    (typeof wat.object === 'string' || isBytes(wat.object))
  );
}
