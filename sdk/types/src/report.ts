/**
 * 出错行附近的源码窗口
 */
export interface SourceContext {
  /** 出错行之前的若干行 */
  pre_lines: string[];
  /** 出错行本身 */
  current_line: string;
  /** 出错行之后的若干行 */
  post_lines: string[];
  /** pre_lines 第一行的行号，从 1 开始 */
  pre_start_line: number;
}

/**
 * 帧的来源分类，只用于展示时的分组
 */
export type OriginModuleKind = 'framework' | 'user';

/**
 * 报告中的一帧
 *
 * 字段名是与渲染器之间的约定，HTML 模板和 JSON 输出都直接使用这些名字
 */
export interface ReportFrame {
  filename: string;
  function_name: string;
  /** 展示给用户的行号，从 1 开始 */
  line_number: number;
  source_context: SourceContext;
  /**
   * 局部变量
   * 在组装报告之前值还是原始值，组装完成后变为有长度上限且经过 HTML 转义的字符串
   */
  locals: Array<[string, unknown]>;
  module: string;
  origin_module_kind: OriginModuleKind;
  /** 该帧所属错误的起因 */
  cause_exception?: unknown;
  /** 起因是否是显式声明的（`cause`），而不是处理另一个错误时顺带记录下的上下文 */
  cause_is_explicit: boolean;
  /** 一次遍历内稳定的帧标识 */
  frame_identity: number;
}

/**
 * 组装完成后的帧，局部变量已经渲染为字符串
 */
export interface RenderedReportFrame extends Omit<ReportFrame, 'locals'> {
  locals: Array<[string, string]>;
}

/**
 * 一次错误事件的完整报告
 *
 * 每个被处理的错误事件构造一次，组装后不可变，只交给一次渲染调用
 */
export interface Report {
  /** 错误类型名，没有错误时缺省 */
  exception_type?: string;
  /** 错误信息，没有错误时缺省 */
  exception_value?: string;
  /** 编解码错误时出错位置附近的片段，其余情况为空字符串 */
  unicode_hint: string;
  frames: readonly RenderedReportFrame[];
  last_frame?: RenderedReportFrame;
  /** 当前进程的可执行文件 */
  process_executable: string;
  /** 运行时版本，例如 20.11.1 */
  runtime_version: string;
  platform: string;
  pid: number;
  cwd: string;
  argv: readonly string[];
  /** ISO 8601 格式的 UTC 时间 */
  server_time: string;
}

/**
 * 报告的输出格式
 */
export type OutputFormat = 'html' | 'json';
