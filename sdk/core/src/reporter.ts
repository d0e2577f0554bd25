import type {
  RenderedReportFrame,
  Report,
  ReportFrame,
  ReporterOptions,
  Traceback,
} from '@stackreport/types';
import {
  decodeBytes,
  generateReportName,
  getExceptionMessage,
  getExceptionTypeName,
  isTextCodecError,
} from '@stackreport/utils';

import { getTracebackFrames } from './chain';
import { renderFrameVars } from './frames';
import { htmlRenderer } from './render/html';
import { jsonRenderer } from './render/json';
import {
  TRACEBACK_HEADER,
  formatExceptionOnly,
  formatFrames,
} from './render/text';

/** 编解码错误提示在出错区间两侧各多取的字符数 */
const UNICODE_HINT_SLACK = 5;

/**
 * 为一次错误事件组织报告
 *
 * 每次调用 getTracebackData 都会重新遍历错误链，对同一个错误多次调用得到的报告
 * 除了 server_time 之外完全相同
 *
 * @example
 * ```ts
 * try {
 *   run();
 * } catch (e) {
 *   const reporter = new ExceptionReporter(e);
 *   writeFileSync(`${reporter.exceptionFilename()}.html`, reporter.getTracebackHtml());
 * }
 * ```
 */
export class ExceptionReporter {
  private readonly _exception: unknown;
  private readonly _traceback?: Traceback;
  private readonly _options: ReporterOptions;

  /**
   * @param exception 要报告的错误，undefined 表示没有错误，会生成一份空报告
   * @param traceback 显式提供的调用栈，只在错误链中只有一个错误时使用
   * @param options 引擎配置
   */
  public constructor(
    exception?: unknown,
    traceback?: Traceback,
    options: ReporterOptions = {},
  ) {
    this._exception = exception;
    this._traceback = traceback;
    this._options = options;
  }

  /**
   * 遍历错误链，返回局部变量尚未渲染的帧
   */
  public getTracebackFrames(): ReportFrame[] {
    return getTracebackFrames(this._exception, this._traceback, this._options);
  }

  /**
   * 组装完整的报告，返回的报告是冻结的
   */
  public getTracebackData(): Report {
    const frames: RenderedReportFrame[] = this.getTracebackFrames().map(
      (frame) =>
        freezeFrame({
          ...frame,
          locals: renderFrameVars(frame.locals, this._options.formatValue),
        }),
    );

    const report: Report = {
      unicode_hint: this._getUnicodeHint(),
      frames: Object.freeze(frames),
      process_executable: process.execPath,
      runtime_version: process.versions.node,
      platform: process.platform,
      pid: process.pid,
      cwd: process.cwd(),
      argv: Object.freeze(process.argv.slice()),
      server_time: new Date().toISOString(),
    };

    if (this._hasException()) {
      report.exception_type = getExceptionTypeName(this._exception);
      report.exception_value = getExceptionMessage(this._exception);
    }

    const lastFrame = frames[frames.length - 1];
    if (lastFrame) {
      report.last_frame = lastFrame;
    }

    return Object.freeze(report);
  }

  /**
   * 渲染为 HTML 页面
   */
  public getTracebackHtml(): string {
    return htmlRenderer.render(this.getTracebackData());
  }

  /**
   * 渲染为 JSON
   */
  public getTracebackJson(): string {
    return jsonRenderer.render(this.getTracebackData());
  }

  /**
   * 报告的文件名（不含扩展名），由两个随机的 32 位十六进制串拼接而成
   */
  public exceptionFilename(): string {
    return generateReportName();
  }

  /**
   * 纯文本形式的调用栈，每个元素以换行结尾：
   * 第一行是 `Traceback (most recent call last):`，
   * 然后每一帧一个元素，最后是错误本身的描述
   */
  public formatException(): string[] {
    const exceptionOnly = this._hasException()
      ? formatExceptionOnly(
          getExceptionTypeName(this._exception),
          getExceptionMessage(this._exception),
        )
      : [];

    return [
      TRACEBACK_HEADER,
      ...formatFrames(this.getTracebackFrames()),
      ...exceptionOnly,
    ];
  }

  private _hasException(): boolean {
    return this._exception !== undefined && this._exception !== null;
  }

  /**
   * 编解码错误时，返回出错区间两侧各多取 5 个字符的片段，字节按 ASCII 解码
   */
  private _getUnicodeHint(): string {
    const exception = this._exception;
    if (!isTextCodecError(exception)) {
      return '';
    }

    const { object, start, end } = exception;
    const lower = Math.max(start - UNICODE_HINT_SLACK, 0);
    const upper = Math.min(end + UNICODE_HINT_SLACK, object.length);

    if (typeof object === 'string') {
      return object.slice(lower, upper);
    }
    return decodeBytes(object.subarray(lower, upper), 'ascii', 'replace');
  }
}

/**
 * 冻结一帧及其中的数组和对象，报告交出去之后任何一层都不能再被修改
 */
function freezeFrame(frame: RenderedReportFrame): RenderedReportFrame {
  frame.locals.forEach((entry) => Object.freeze(entry));
  Object.freeze(frame.locals);
  Object.freeze(frame.source_context.pre_lines);
  Object.freeze(frame.source_context.post_lines);
  Object.freeze(frame.source_context);
  return Object.freeze(frame);
}
