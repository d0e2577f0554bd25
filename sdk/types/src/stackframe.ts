/**
 * 能够在文件系统之外提供源码的加载器
 * 例如通过 vm 动态执行的代码、内存中的模块等，它们在磁盘上没有对应的文件
 */
export interface SourceLoader {
  /**
   * 根据模块名返回源码文本，无法提供时返回 undefined
   * 允许抛出异常，调用方会把异常视为“无法提供”，然后退回到读取文件
   */
  getSource(moduleName: string): string | undefined;
}

/**
 * 局部变量快照，按声明顺序排列的 [变量名, 原始值] 二元组
 */
export type FrameLocals = ReadonlyArray<readonly [string, unknown]>;

/**
 * 一条调用栈记录，是宿主运行时需要实现的能力接口
 *
 * 引擎只依赖这个接口，而不依赖具体运行时的栈帧对象。
 * Node 中这些记录来自解析 error.stack，也可以由调用方显式构造后挂到错误对象上
 */
export interface StackFrameRecord {
  /** 帧所在的文件路径，或者是 `node:internal/...` 这样的内部标识 */
  filename: string;

  /** 函数名，无法解析时为 `?` */
  function: string;

  /**
   * 运行时记录的行号，从 1 开始
   * 这是指令指针所在的行，而不是调用发生的行
   */
  lineno: number;

  /** 列号，从 1 开始 */
  colno?: number;

  /** 模块名，用于源码加载器查询以及区分框架代码与用户代码 */
  module?: string;

  /** 局部变量 */
  locals: FrameLocals;

  /** 该帧专属的源码加载器 */
  loader?: SourceLoader;

  /**
   * 为 true 时该帧不会出现在报告中
   * 由协作方代码显式设置，用来隐藏框架内部的噪音帧
   */
  hidden?: boolean;
}
