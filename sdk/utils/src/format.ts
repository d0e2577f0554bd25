import { inspect } from 'node:util';

import { isError } from './is';

/** 值无法转换为字符串时使用的占位符 */
const UNSERIALIZABLE = '[value cannot be serialized]';

/**
 * 把任意值格式化为多行、带缩进的调试输出
 * 对象可以通过实现 `util.inspect.custom` 自定义输出
 */
export function debugFormat(value: unknown): string {
  return inspect(value, {
    depth: 4,
    breakLength: 80,
    maxArrayLength: 100,
    sorted: false,
  });
}

/**
 * 用给定的格式化函数格式化一个值，保证不会抛出异常
 * 格式化失败时返回格式化过程中抛出的错误的描述
 */
export function safeFormat(
  value: unknown,
  formatter: (value: unknown) => string | Uint8Array = debugFormat,
): string | Uint8Array {
  try {
    return formatter(value);
  } catch (e) {
    return describeError(e);
  }
}

/**
 * 返回错误的简短描述，形如 `TypeError('x is not a function')`
 */
export function describeError(error: unknown): string {
  try {
    if (isError(error)) {
      return `${getExceptionTypeName(error)}(${inspect(String(error.message))})`;
    }
    return safeDescribe(error);
  } catch (_e) {
    return UNSERIALIZABLE;
  }
}

/**
 * 把任意值转换为字符串，不会抛出异常
 */
export function safeDescribe(value: unknown): string {
  try {
    return String(value);
  } catch (_e) {
    try {
      return inspect(value, { depth: 1 });
    } catch (_oO) {
      return UNSERIALIZABLE;
    }
  }
}

/**
 * 获取错误的类型名
 *
 * 没有单独设置 name 的自定义错误类，其 name 仍然是 `Error`，此时使用构造函数的名字
 */
export function getExceptionTypeName(value: unknown): string {
  try {
    if (isError(value)) {
      if (value.name && value.name !== 'Error') {
        return value.name;
      }
      return getConstructorName(value) || 'Error';
    }

    if (value === null) {
      return 'null';
    }

    if (typeof value === 'object') {
      return getConstructorName(value) || 'Object';
    }

    return typeof value;
  } catch (_e) {
    return 'unknown';
  }
}

/**
 * 获取错误信息，非 Error 值直接转换为字符串
 */
export function getExceptionMessage(value: unknown): string {
  if (isError(value)) {
    try {
      return String(value.message);
    } catch (_e) {
      return UNSERIALIZABLE;
    }
  }
  return safeDescribe(value);
}

function getConstructorName(value: object): string | undefined {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== 'object' || proto === null || !('constructor' in proto)) {
    return undefined;
  }
  const ctor = proto.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : undefined;
}
