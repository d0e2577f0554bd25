import type { Client } from '@stackreport/types';

import type { Logger } from './logger';
import { SDK_VERSION } from './version';

/**
 * 挂在全局对象上的 SDK 状态
 * 同一进程中可能同时加载了多份 SDK（例如不同依赖各自带了一份），按版本号隔开
 */
export interface StackReportCarrier {
  logger?: Logger;
  client?: Client;
}

/** Internal global with common properties and StackReport extensions  */
export type InternalGlobal = {
  console: Console;
  __STACKREPORT__?: Record<string, StackReportCarrier>;
};

/** 获取当前JavaScript运行时的全局对象 */
export const GLOBAL_OBJ: InternalGlobal = globalThis;

/**
 * 返回当前 SDK 版本在全局对象上的承载器，不存在时创建
 */
export function getMainCarrier(): StackReportCarrier {
  // 初始化 __STACKREPORT__
  const carrier = (GLOBAL_OBJ.__STACKREPORT__ = GLOBAL_OBJ.__STACKREPORT__ || {});
  // 为当前 SDK 版本创建或获取一个版本化的承载器，不存在的默认为空对象
  return (carrier[SDK_VERSION] = carrier[SDK_VERSION] || {});
}

/**
 * 这个函数用于管理全局单例实例，它确保在全局环境中某个特定对象只有一个实例存在
 *
 * @param name 全局单例在承载器上的名称
 * @param creator 工厂函数，单例不存在时调用它创建
 * @returns 返回全局单例对象
 */
export function getGlobalSingleton<K extends keyof StackReportCarrier>(
  name: K,
  creator: () => NonNullable<StackReportCarrier[K]>,
): NonNullable<StackReportCarrier[K]> {
  const versionedCarrier = getMainCarrier();

  const existing = versionedCarrier[name];
  if (existing) {
    return existing;
  }

  // 不存在则调用 creator 创建新的单例实例，并将其存储，然后返回该实例。
  const created = creator();
  versionedCarrier[name] = created;
  return created;
}
