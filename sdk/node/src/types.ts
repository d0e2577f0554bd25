import type { ClientOptions, Options } from '@stackreport/types';

/**
 * Node SDK 的初始化配置
 */
export interface NodeOptions extends Options {
  /**
   * 没有提供 storage 时，报告写入这个目录
   * 默认读取环境变量 STACKREPORT_OUTPUT_PATH，没有时为系统临时目录下的 stackreport
   */
  outputPath?: string;
}

/**
 * Node 客户端的配置，所有默认值都已经确定
 */
export type NodeClientOptions = ClientOptions;
