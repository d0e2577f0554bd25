import type { Client, ClientOptions } from '@stackreport/types';
import { consoleSandbox, getMainCarrier, logger } from '@stackreport/utils';

import { DEBUG_BUILD } from './debug-build';

/** A class object that can instantiate Client objects. */
export type ClientClass<F extends Client, O extends ClientOptions> = new (
  options: O,
) => F;

/**
 * 这个函数用于创建一个新的 SDK 客户端实例，配置并设置为当前客户端
 *
 * @param clientClass 用于创建客户端实例的类
 * @param options 用于初始化客户端的配置选项
 * @returns 返回一个新的客户端实例
 */
export function initAndBind<F extends Client, O extends ClientOptions>(
  clientClass: ClientClass<F, O>,
  options: O,
): F {
  if (options.debug === true) {
    if (DEBUG_BUILD) {
      logger.enable();
    } else {
      // 非调试构建中调试日志已经被移除，只能提示用户
      consoleSandbox(() => {
        // eslint-disable-next-line no-console
        console.warn(
          '[StackReport] Cannot initialize SDK with `debug` option using a non-debug bundle.',
        );
      });
    }
  }

  const client = new clientClass(options);
  setCurrentClient(client);
  client.init();

  return client;
}

/**
 * 将给定的客户端实例设置为当前客户端，模块级的 captureException 等函数都使用它
 */
export function setCurrentClient(client: Client | undefined): void {
  getMainCarrier().client = client;
}

/**
 * 获取当前客户端，没有初始化时返回 undefined
 */
export function getClient(): Client | undefined {
  return getMainCarrier().client;
}
