import { randomUUID } from 'node:crypto';

/**
 * 装传入的数据转为数组
 * @param maybeArray
 * @returns
 */
export function arrayify<T = unknown>(maybeArray: T | T[]): T[] {
  return Array.isArray(maybeArray) ? maybeArray : [maybeArray];
}

/**
 * 这个函数用于生成 UUIDv4（版本4 UUID），去掉了其中的破折号，共 32 个十六进制字符
 *
 * @returns string Generated UUID4.
 */
export function uuid4(): string {
  try {
    return randomUUID().replace(/-/g, '');
  } catch (_) {
    // 某些受限的运行时调用 crypto 会失败，退回到 Math.random
  }

  /**
   * UUIDv4 的结构是 xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx
   * x 是一个随机的十六进制数字（0-9, a-f），4 固定表示版本号，y 的范围在 8-b 之间，表示变体
   */
  return 'xxxxxxxxxxxx4xxxyxxxxxxxxxxxxxxx'.replace(/[xy]/g, (c) => {
    // eslint-disable-next-line no-bitwise
    const r = (Math.random() * 16) | 0;
    // eslint-disable-next-line no-bitwise
    return (c === 'x' ? r : (r & 0x3) | 0x8).toString(16);
  });
}

/**
 * 生成报告名：两个 UUIDv4 拼接，共 64 个十六进制字符
 */
export function generateReportName(): string {
  return uuid4() + uuid4();
}
