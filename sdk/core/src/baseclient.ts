import type {
  CaptureHint,
  Client,
  ClientOptions,
  Integration,
  LogRecord,
  ReportRenderer,
  ReportStorage,
} from '@stackreport/types';
import { logger, makePromiseBuffer } from '@stackreport/utils';
import type { PromiseBuffer } from '@stackreport/utils';

import { DEBUG_BUILD } from './debug-build';
import type { IntegrationIndex } from './integration';
import {
  afterSetupIntegrations,
  setupIntegration,
  setupIntegrations,
} from './integration';
import { getRenderer } from './render';
import { ExceptionReporter } from './reporter';

/** 同时等待写入的报告数量上限 */
export const DEFAULT_BUFFER_SIZE = 64;

/**
 * 所有客户端的基类
 *
 * 客户端把报告引擎、渲染器和存储后端串起来。捕获错误时报告在调用方的调用栈中同步组装，
 * 渲染后交给存储后端异步写入，正在写入的报告保存在一个有上限的缓冲区中，可以通过 flush 等待它们完成。
 *
 * @example
 * class NodeClient extends BaseClient<NodeClientOptions> {
 *   public constructor(options: NodeClientOptions) {
 *     super(options);
 *   }
 * }
 */
export abstract class BaseClient<O extends ClientOptions> implements Client<O> {
  /** 保存传递给 SDK 的选项 */
  protected readonly _options: O;

  /** 根据 outputFormat 选出的渲染器 */
  protected readonly _renderer: ReportRenderer;

  /** 已设置的集成 */
  protected _integrations: IntegrationIndex;

  /** 正在写入的报告 */
  protected readonly _buffer: PromiseBuffer<string>;

  protected constructor(options: O) {
    this._options = options;
    this._integrations = {};
    this._renderer = getRenderer(options.outputFormat);
    this._buffer = makePromiseBuffer<string>(
      options.bufferSize || DEFAULT_BUFFER_SIZE,
    );
  }

  /**
   * @inheritDoc
   */
  public captureException(
    exception: unknown,
    hint: CaptureHint = {},
  ): Promise<string> {
    return this._buffer.add(() => this._captureReport(exception, hint));
  }

  /**
   * @inheritDoc
   */
  public captureLogRecord(record: LogRecord): Promise<string> {
    return this.captureException(record.error, {
      traceback: record.traceback,
      message: record.message,
    });
  }

  /**
   * 获取配置信息
   * @inheritDoc
   */
  public getOptions(): O {
    return this._options;
  }

  /**
   * @inheritDoc
   */
  public getRenderer(): ReportRenderer {
    return this._renderer;
  }

  /**
   * @inheritDoc
   */
  public getStorage(): ReportStorage {
    return this._options.storage;
  }

  /**
   * 等待所有正在写入的报告完成
   * @inheritDoc
   */
  public flush(timeout?: number): Promise<boolean> {
    return this._buffer.drain(timeout);
  }

  /**
   * 用于初始化 SDK，包括设置集成
   * @inheritDoc
   */
  public init(): void {
    this._setupIntegrations();
  }

  /**
   * 通过名称获取已安装的集成
   *
   * @returns 返回指定名称的集成，或者在未找到集成时返回 undefined
   */
  public getIntegrationByName<T extends Integration = Integration>(
    integrationName: string,
  ): T | undefined {
    return this._integrations[integrationName] as T | undefined;
  }

  /**
   * 用于添加集成到 SDK 中，确保每个集成只被安装一次
   * @inheritDoc
   */
  public addIntegration(integration: Integration): void {
    const isAlreadyInstalled = this._integrations[integration.name];

    setupIntegration(this, integration, this._integrations);
    // Here we need to check manually to make sure to not run this multiple times
    if (!isAlreadyInstalled) {
      afterSetupIntegrations(this, [integration]);
    }
  }

  /** Setup integrations for this client. */
  protected _setupIntegrations(): void {
    const { integrations } = this._options;
    this._integrations = setupIntegrations(this, integrations);
    afterSetupIntegrations(this, integrations);
  }

  /**
   * 组装报告、渲染并写入存储后端
   *
   * 组装和渲染在第一次 await 之前完成，也就是在 captureException 返回之前同步完成，
   * 报告反映的是捕获时刻的状态
   */
  protected async _captureReport(
    exception: unknown,
    hint: CaptureHint,
  ): Promise<string> {
    const reporter = new ExceptionReporter(
      exception,
      hint.traceback,
      this._options,
    );
    const body = this._renderer.render(reporter.getTracebackData());
    const name = reporter.exceptionFilename();

    const location = await this._options.storage.write(
      name,
      this._renderer.extension,
      body,
      this._renderer.contentType,
    );

    DEBUG_BUILD &&
      logger.log(
        `Stored exception report at ${location}${hint.message ? ` (${hint.message})` : ''}`,
      );

    return location;
  }
}
