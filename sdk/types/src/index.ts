export type { CaptureHint, Client } from './client';
export type { Integration, IntegrationFn } from './integration';
export type {
  ConsoleLevel,
  HandlerDataConsole,
  HandlerDataError,
  HandlerDataUnhandledRejection,
} from './instrument';
export type { LogRecord } from './logrecord';
export type { ClientOptions, Options, ReporterOptions } from './options';
export type { ReportRenderer } from './renderer';
export type {
  OriginModuleKind,
  OutputFormat,
  RenderedReportFrame,
  Report,
  ReportFrame,
  SourceContext,
} from './report';
export type {
  FrameLocals,
  SourceLoader,
  StackFrameRecord,
} from './stackframe';
export type {
  StackLineParser,
  StackLineParserFn,
  StackParser,
  Traceback,
} from './stacktrace';
export type { ReportStorage } from './storage';
