import type {
  Client,
  Integration,
  IntegrationFn,
  Options,
} from '@stackreport/types';
import { arrayify, logger } from '@stackreport/utils';

import { DEBUG_BUILD } from './debug-build';

/** 已经调用过 setupOnce 的集成名，setupOnce 在整个进程中只调用一次 */
export const installedIntegrations: string[] = [];

/** 集成名到集成实例的映射 */
export type IntegrationIndex = {
  [key: string]: Integration;
};

/**
 * 定义一个集成工厂函数，返回值只暴露 Integration 接口，集成内部的实现细节不对外暴露
 */
export function defineIntegration<Fn extends IntegrationFn>(
  fn: Fn,
): (...args: Parameters<Fn>) => Integration {
  return fn;
}

/**
 * 按名称去重，后出现的集成覆盖先出现的同名集成，
 * 但默认实例不会覆盖用户提供的实例
 *
 * @private
 */
function filterDuplicates(integrations: Integration[]): Integration[] {
  const integrationsByName: IntegrationIndex = {};

  integrations.forEach((currentInstance) => {
    const existingInstance = integrationsByName[currentInstance.name];

    if (
      existingInstance &&
      !existingInstance.isDefaultInstance &&
      currentInstance.isDefaultInstance
    ) {
      return;
    }

    integrationsByName[currentInstance.name] = currentInstance;
  });

  return Object.values(integrationsByName);
}

/**
 * 合并默认集成和用户提供的集成，返回最终要安装的集成
 *
 * `integrations` 为数组时追加在默认集成之后；为函数时以默认集成为参数调用，使用它的返回值
 */
export function getIntegrationsToSetup(
  options: Pick<Options, 'defaultIntegrations' | 'integrations'>,
): Integration[] {
  const defaultIntegrations = options.defaultIntegrations || [];
  const userIntegrations = options.integrations;

  defaultIntegrations.forEach((integration) => {
    integration.isDefaultInstance = true;
  });

  let integrations: Integration[];

  if (Array.isArray(userIntegrations)) {
    integrations = [...defaultIntegrations, ...userIntegrations];
  } else if (typeof userIntegrations === 'function') {
    integrations = arrayify(userIntegrations(defaultIntegrations));
  } else {
    integrations = defaultIntegrations;
  }

  return filterDuplicates(integrations);
}

/**
 * 依次安装给定的集成，返回集成名到集成实例的映射
 *
 * @param client 集成所属的客户端
 * @param integrations 要安装的集成
 */
export function setupIntegrations(
  client: Client,
  integrations: Integration[],
): IntegrationIndex {
  const integrationIndex: IntegrationIndex = {};

  integrations.forEach((integration) => {
    // guard against empty provided integrations
    if (integration) {
      setupIntegration(client, integration, integrationIndex);
    }
  });

  return integrationIndex;
}

/**
 * 在所有集成都安装完之后调用它们的 afterAllSetup 钩子
 */
export function afterSetupIntegrations(
  client: Client,
  integrations: Integration[],
): void {
  for (const integration of integrations) {
    // guard against empty provided integrations
    if (integration && integration.afterAllSetup) {
      integration.afterAllSetup(client);
    }
  }
}

/**
 * 安装单个集成
 *
 * 同名的集成在同一个客户端上只安装一次；
 * setupOnce 在整个进程中只调用一次，setup 每个客户端调用一次
 */
export function setupIntegration(
  client: Client,
  integration: Integration,
  integrationIndex: IntegrationIndex,
): void {
  if (integrationIndex[integration.name]) {
    DEBUG_BUILD &&
      logger.log(
        `Integration skipped because it was already installed: ${integration.name}`,
      );
    return;
  }
  integrationIndex[integration.name] = integration;

  if (
    installedIntegrations.indexOf(integration.name) === -1 &&
    typeof integration.setupOnce === 'function'
  ) {
    integration.setupOnce();
    installedIntegrations.push(integration.name);
  }

  if (typeof integration.setup === 'function') {
    integration.setup(client);
  }

  DEBUG_BUILD && logger.log(`Integration installed: ${integration.name}`);
}
