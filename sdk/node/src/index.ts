export type { NodeClientOptions, NodeOptions } from './types';
export type {
  LocalStorageOptions,
  S3SendClient,
  S3StorageOptions,
} from './storage';

export {
  BaseClient,
  ExceptionReporter,
  SDK_VERSION,
  annotateFrame,
  attachTraceback,
  captureException,
  captureLogRecord,
  defineIntegration,
  flush,
  getClient,
  setCurrentClient,
  setErrorContext,
} from '@stackreport/core';

export { NodeClient } from './client';
export { getClientOptions, getDefaultIntegrations, init } from './sdk';
export { LocalStorage, S3Storage } from './storage';
export { consoleIntegration } from './integrations/console';
export { onUncaughtExceptionIntegration } from './integrations/onuncaughtexception';
export { onUnhandledRejectionIntegration } from './integrations/onunhandledrejection';
