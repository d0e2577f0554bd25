/**
 * 用一个包装版本替代对象中的某个方法，同时保留原始方法，
 * 以便后续在包装方法中能够调用原始方法。
 *
 * @param source 一个对象，包含需要被包装的方法
 * @param name 要包装的方法的名称
 * @param replacementFactory 一个高阶函数，接受原始方法并返回一个包装版本。
 * 返回的函数必须是普通函数(非箭头函数)，以便保留正确的 this 上下文
 */
export function fill<T extends object, K extends keyof T>(
  source: T,
  name: K,
  replacementFactory: (original: T[K]) => T[K],
): void {
  // 指定的方法不存在，直接返回
  if (!(name in source)) {
    return;
  }

  source[name] = replacementFactory(source[name]);
}
