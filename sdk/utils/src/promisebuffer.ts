import { ReporterError } from './error';

export interface PromiseBuffer<T> {
  // exposes the internal array so tests can assert on the state of it.
  $: Array<Promise<T>>;
  add(taskProducer: () => Promise<T>): Promise<T>;
  drain(timeout?: number): Promise<boolean>;
}

/**
 * 用于创建一个 Promise 缓冲区对象，限制同时进行中的 Promise 数量，并提供等待它们全部完成的方法
 * 客户端用它来跟踪正在写入存储后端的报告
 *
 * @param limit 缓冲区中允许的最大 Promise 数量，如果超过限制，则新的 Promise 不会被添加到缓冲区
 */
export function makePromiseBuffer<T>(limit?: number): PromiseBuffer<T> {
  const buffer: Array<Promise<T>> = [];

  /** 判断缓冲区是否可以接受新的promise */
  function isReady(): boolean {
    return limit === undefined || buffer.length < limit;
  }

  /**
   * 从队列中移除指定 promise
   */
  function remove(task: Promise<T>): void {
    const index = buffer.indexOf(task);
    if (index > -1) {
      buffer.splice(index, 1);
    }
  }

  /**
   * 将 Promise 添加到队列，并在任务结束（无论成功失败）时自动移除自己
   *
   * @param taskProducer 生产 Promise 的函数。只有确认缓冲区有空间时才会调用它，
   * 缓冲区满了的时候任务根本不会开始执行
   *
   * @returns The original promise.
   */
  function add(taskProducer: () => Promise<T>): Promise<T> {
    if (!isReady()) {
      return Promise.reject(
        new ReporterError('Not adding Promise because buffer limit was reached.'),
      );
    }

    const task = taskProducer();
    if (buffer.indexOf(task) === -1) {
      buffer.push(task);
    }
    // 失败由调用方通过返回的 task 处理，这里只负责清理
    void task.then(
      () => remove(task),
      () => remove(task),
    );
    return task;
  }

  /**
   * 等待缓冲区中的所有任务结束，
   * 超时时间内全部结束返回 true，否则返回 false
   *
   * @param timeout 如果超时设为 0 或未传递，那么函数会等待所有 Promise 执行完毕
   */
  function drain(timeout?: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      // 记录当前缓冲区中 Promise 的数量
      let counter = buffer.length;

      if (!counter) {
        return resolve(true);
      }

      const capturedSetTimeout =
        timeout && timeout > 0
          ? setTimeout(() => resolve(false), timeout)
          : undefined;

      const settle = (): void => {
        if (!--counter) {
          clearTimeout(capturedSetTimeout);
          resolve(true);
        }
      };

      // 拷贝一份，任务结束时会从 buffer 中移除自己
      buffer.slice().forEach((item) => {
        void item.then(settle, settle);
      });
    });
  }

  return {
    $: buffer,
    add,
    drain,
  };
}
