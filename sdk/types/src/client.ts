import type { Integration } from './integration';
import type { LogRecord } from './logrecord';
import type { ClientOptions } from './options';
import type { ReportRenderer } from './renderer';
import type { Traceback } from './stacktrace';
import type { ReportStorage } from './storage';

/**
 * 捕获错误时可以附带的额外信息
 */
export interface CaptureHint {
  /** 显式提供的调用栈，只在错误链中只有一个错误时使用 */
  traceback?: Traceback;
  /** 触发这次捕获的日志内容 */
  message?: string;
}

/**
 * 面向用户的客户端
 *
 * 客户端把报告引擎、渲染器和存储后端串起来：
 * 捕获错误 -> 组装报告 -> 渲染 -> 交给存储后端持久化
 */
export interface Client<O extends ClientOptions = ClientOptions> {
  /**
   * 为一个错误生成报告并存储
   *
   * @param exception 要捕获的错误，undefined 表示没有错误，会生成一份空报告
   * @param hint 额外信息（可选）
   * @returns 报告存储的位置，存储失败时 reject
   */
  captureException(exception: unknown, hint?: CaptureHint): Promise<string>;

  /**
   * 为一条日志记录生成报告，记录中没有错误时生成一份空报告
   * 按级别过滤由触发它的集成负责
   *
   * @returns 报告存储的位置
   */
  captureLogRecord(record: LogRecord): Promise<string>;

  /** 返回客户端的配置 */
  getOptions(): O;

  /** 当前使用的渲染器 */
  getRenderer(): ReportRenderer;

  /** 当前使用的存储后端 */
  getStorage(): ReportStorage;

  /**
   * 等待所有正在写入的报告完成
   *
   * @param timeout 最长等待时间（毫秒），不传时一直等待
   * @returns 超时返回 false
   */
  flush(timeout?: number): Promise<boolean>;

  /** 安装配置中的集成 */
  init(): void;

  /** 按名称查找已安装的集成 */
  getIntegrationByName<T extends Integration = Integration>(
    name: string,
  ): T | undefined;

  /** 在初始化之后追加一个集成 */
  addIntegration(integration: Integration): void;
}
