export type { ClientClass } from './sdk';
export type { ErrorCause } from './chain';
export type { GetLinesFromFileOptions, SourceLines } from './frames';
export type { IntegrationIndex } from './integration';

export { captureException, captureLogRecord, flush } from './exports';
export { getClient, initAndBind, setCurrentClient } from './sdk';
export { BaseClient, DEFAULT_BUFFER_SIZE } from './baseclient';
export {
  defineIntegration,
  getIntegrationsToSetup,
  installedIntegrations,
} from './integration';
export { ExceptionReporter } from './reporter';
export {
  DEFAULT_FRAMEWORK_MODULE_PREFIXES,
  MAX_CHAIN_LENGTH,
  defaultStackParser,
  getErrorCause,
  getErrorTraceback,
  getExceptionChain,
  getOriginModuleKind,
  getTracebackFrames,
} from './chain';
export {
  DEFAULT_CONTEXT_LINES,
  MAX_VARIABLE_LENGTH,
  getLinesFromFile,
  renderFrameVariable,
  renderFrameVars,
} from './frames';
export {
  TRACEBACK_HEADER,
  formatExceptionOnly,
  formatFrames,
  getRenderer,
  htmlRenderer,
  jsonRenderer,
  renderHtmlReport,
  renderJsonReport,
} from './render';

export {
  SDK_VERSION,
  annotateFrame,
  attachTraceback,
  setErrorContext,
} from '@stackreport/utils';
