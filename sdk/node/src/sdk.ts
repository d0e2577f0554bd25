import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  defaultStackParser,
  getIntegrationsToSetup,
  initAndBind,
} from '@stackreport/core';
import type { Integration, OutputFormat } from '@stackreport/types';
import { consoleSandbox } from '@stackreport/utils';

import { NodeClient } from './client';
import { consoleIntegration } from './integrations/console';
import { onUncaughtExceptionIntegration } from './integrations/onuncaughtexception';
import { onUnhandledRejectionIntegration } from './integrations/onunhandledrejection';
import { LocalStorage } from './storage/local';
import type { NodeClientOptions, NodeOptions } from './types';

/** 获取 Node SDK 的默认集成 */
export function getDefaultIntegrations(_options: NodeOptions): Integration[] {
  return [
    consoleIntegration(),
    onUncaughtExceptionIntegration(),
    onUnhandledRejectionIntegration(),
  ];
}

/**
 * 初始化 Node SDK，创建客户端并设置为当前客户端
 *
 * @example
 * ```
 * import { init, S3Storage } from '@stackreport/node';
 *
 * init({
 *   storage: new S3Storage({ bucket: 'error-reports', prefix: 'api/' }),
 *   outputFormat: 'json',
 * });
 * ```
 */
export function init(options: NodeOptions = {}): NodeClient {
  const clientOptions = getClientOptions(options);
  return initAndBind(NodeClient, clientOptions);
}

/**
 * 合并用户配置、环境变量和默认值，得到客户端的完整配置
 */
export function getClientOptions(
  options: NodeOptions,
  env: NodeJS.ProcessEnv = process.env,
): NodeClientOptions {
  const {
    defaultIntegrations: userDefaultIntegrations,
    integrations: userIntegrations,
    outputPath,
    storage,
    ...rest
  } = options;

  const defaultIntegrations =
    userDefaultIntegrations === undefined
      ? getDefaultIntegrations(options)
      : userDefaultIntegrations;

  const debug =
    options.debug === undefined
      ? envToBool(env.STACKREPORT_DEBUG)
      : options.debug;

  return {
    ...rest,
    debug,
    outputFormat:
      options.outputFormat || getOutputFormat(env.STACKREPORT_OUTPUT_FORMAT),
    stackParser: options.stackParser || defaultStackParser,
    storage:
      storage ||
      new LocalStorage({
        outputPath:
          outputPath ||
          env.STACKREPORT_OUTPUT_PATH ||
          join(tmpdir(), 'stackreport'),
      }),
    integrations: getIntegrationsToSetup({
      defaultIntegrations,
      integrations: userIntegrations,
    }),
  };
}

function getOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === '' || value === 'html') {
    return 'html';
  }
  if (value === 'json') {
    return 'json';
  }

  consoleSandbox(() => {
    // eslint-disable-next-line no-console
    console.warn(
      `[StackReport] Unknown STACKREPORT_OUTPUT_FORMAT "${value}", falling back to html.`,
    );
  });
  return 'html';
}

const TRUTHY_ENV_STRINGS = ['true', 't', 'y', 'yes', 'on', '1'];

function envToBool(value: string | undefined): boolean {
  return TRUTHY_ENV_STRINGS.includes(String(value).toLowerCase());
}
