import type { ConsoleLevel } from '@stackreport/types';

/**
 * SDK 自身抛出的错误，继承自 js 的内置 Error 类，
 * 并添加了 logLevel，用于控制集成记录这个错误时使用的日志级别。
 */
export class ReporterError extends Error {
  /** 显示此错误实例的名称,它的值为当前类的名称 */
  public name: string;

  /** 日志级别 */
  public logLevel: ConsoleLevel;

  public constructor(
    public message: string,
    logLevel: ConsoleLevel = 'warn',
  ) {
    super(message);

    this.name = new.target.prototype.constructor.name;

    // 将当前实例 this 的原型设置为 new.target 的原型，保证子类实例能通过 instanceof 检查
    Object.setPrototypeOf(this, new.target.prototype);
    this.logLevel = logLevel;
  }
}

/**
 * 文本编解码错误的公共部分
 *
 * start/end 指向 object 中出问题的那一段（左闭右开），报告会据此截取一段提示
 */
export abstract class TextCodecError extends Error {
  public name: string;

  public constructor(
    /** 使用的编码名 */
    public readonly encoding: string,
    /** 正在编解码的数据 */
    public readonly object: Uint8Array | string,
    public readonly start: number,
    public readonly end: number,
    public readonly reason: string,
  ) {
    super(
      `'${encoding}' codec can't process position ${start}${end - start > 1 ? `-${end - 1}` : ''}: ${reason}`,
    );
    this.name = new.target.prototype.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** 字节无法按指定编码解码 */
export class DecodingError extends TextCodecError {
  public constructor(
    encoding: string,
    object: Uint8Array,
    start: number,
    end: number,
    reason: string,
  ) {
    super(encoding, object, start, end, reason);
  }
}

/** 字符无法按指定编码编码 */
export class EncodingError extends TextCodecError {
  public constructor(
    encoding: string,
    object: string,
    start: number,
    end: number,
    reason: string,
  ) {
    super(encoding, object, start, end, reason);
  }
}
