declare const __DEBUG_BUILD__: boolean | undefined;

/**
 * 构建时注入的调试标记，没有注入时视为调试版本
 * 只在 core 包内部使用，不要导出
 */
export const DEBUG_BUILD =
  typeof __DEBUG_BUILD__ === 'undefined' ? true : __DEBUG_BUILD__;
