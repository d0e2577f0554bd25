// 这个常量通常在构建时由构建工具注入，表示当前构建是否为调试版本
declare const __DEBUG_BUILD__: boolean | undefined;

/**
 * 在开发和调试构建中，__DEBUG_BUILD__ 的值为 true，而在生产构建中为 false
 * 直接从源码运行（例如测试时）没有注入这个常量，此时视为调试版本
 *
 * 这个常量只在 utils 包内部使用，其他包各自声明自己的 DEBUG_BUILD，
 * 这样构建工具才能在生产构建中把受它保护的代码整个去掉
 */
export const DEBUG_BUILD =
  typeof __DEBUG_BUILD__ === 'undefined' ? true : __DEBUG_BUILD__;
