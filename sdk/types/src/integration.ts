import type { Client } from './client';

/**
 * 集成机制允许将触发报告生成的钩子注入到 SDK 中，例如 console 插桩、进程级错误监听
 */
export interface Integration {
  /**
   * 集成的名称，用于标识这个集成
   */
  name: string;

  /**
   * 是否是 SDK 提供的默认实例，用户传入的同名集成会覆盖默认实例
   */
  isDefaultInstance?: boolean;

  /**
   * 这是一个可选的钩子函数，用于在 SDK 初始化时执行一些全局性的设置操作。
   * 该函数只会被调用一次，通常用于全局补丁或类似操作。
   */
  setupOnce?(): void;

  /**
   * 为每一个客户端设置集成，每个客户端实例都会调用一次
   *
   * 尽可能地优先使用 setup 而不是 setupOnce，只有注册全局处理器这样的操作才放在 setupOnce 中
   */
  setup?(client: Client): void;

  /**
   * 在所有集成的 setupOnce 和 setup 都调用完之后触发
   */
  afterAllSetup?(client: Client): void;
}

/**
 * 这个类型定义了一种集成的函数形式，允许开发者通过函数来创建集成。
 */
export type IntegrationFn<IntegrationType = Integration> = (
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  ...rest: any[]
) => IntegrationType;
