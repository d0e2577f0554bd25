import type { Integration } from './integration';
import type { OutputFormat } from './report';
import type { SourceLoader } from './stackframe';
import type { StackParser } from './stacktrace';
import type { ReportStorage } from './storage';

/**
 * 报告引擎本身的配置
 */
export interface ReporterOptions {
  /**
   * 出错行上下各取多少行源码
   * 默认为 7
   */
  contextLines?: number;

  /**
   * 模块名以这些前缀开头的帧被归类为 framework，其余为 user
   * 默认为 ['node:', 'node_modules/']
   */
  frameworkModulePrefixes?: string[];

  /**
   * 源码文件前两行没有编码声明时使用的编码
   * 默认为 ascii
   */
  defaultSourceEncoding?: string;

  /**
   * 帧本身没有加载器时使用的源码加载器
   */
  sourceLoader?: SourceLoader;

  /**
   * 把 error.stack 解析为调用栈的解析器
   */
  stackParser?: StackParser;

  /**
   * 局部变量的格式化函数，默认基于 util.inspect
   * 可以返回字节，字节会以 UTF-8 解码
   */
  formatValue?: (value: unknown) => string | Uint8Array;
}

/**
 * 客户端的完整配置，所有必填项都已经确定
 */
export interface ClientOptions extends ReporterOptions {
  /**
   * 启用 SDK 内部的调试日志
   */
  debug?: boolean;

  /** 报告的存储后端 */
  storage: ReportStorage;

  /**
   * 输出格式
   * 默认为 html
   */
  outputFormat?: OutputFormat;

  /** 最终要安装的集成 */
  integrations: Integration[];

  /**
   * 同时等待写入的报告数量上限
   * 默认为 64
   */
  bufferSize?: number;
}

/**
 * 面向用户的初始化配置
 */
export interface Options extends Partial<Omit<ClientOptions, 'integrations'>> {
  /**
   * SDK 默认安装的集成，传 false 禁用全部默认集成
   */
  defaultIntegrations?: false | Integration[];

  /**
   * 用户提供的集成
   * 可以是数组，也可以是接收默认集成并返回最终集成的函数
   */
  integrations?: Integration[] | ((integrations: Integration[]) => Integration[]);
}
