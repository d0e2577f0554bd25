import { defineIntegration, getClient } from '@stackreport/core';
import type {
  Client,
  ConsoleLevel,
  IntegrationFn,
} from '@stackreport/types';
import {
  addConsoleInstrumentationHandler,
  isError,
  logger,
  safeJoin,
} from '@stackreport/utils';

import { DEBUG_BUILD } from '../debug-build';

interface ConsoleOptions {
  /**
   * 触发报告的 console 级别
   * 默认为 ['error']
   */
  levels?: ConsoleLevel[];
}

const INTEGRATION_NAME = 'Console';

const _consoleIntegration = ((options: ConsoleOptions = {}) => {
  const levels = options.levels || ['error'];

  return {
    name: INTEGRATION_NAME,
    setup(client) {
      addConsoleInstrumentationHandler(({ args, level }) => {
        // 只处理安装了这个集成的客户端
        if (getClient() !== client || !levels.includes(level)) {
          return;
        }

        consoleHandler(client, args, level);
      });
    },
  };
}) satisfies IntegrationFn;

/**
 * 把 console 当作日志框架：指定级别的 console 调用会生成一份报告
 *
 * 参数中的第一个 Error 作为报告的错误，没有 Error 时生成一份空报告。
 * 存储失败只记录到调试日志中，不会抛给调用 console 的代码
 */
export const consoleIntegration = defineIntegration(_consoleIntegration);

function consoleHandler(
  client: Client,
  args: unknown[],
  level: ConsoleLevel,
): void {
  const error = args.find(isError);
  const message = safeJoin(args, ' ');

  void client.captureLogRecord({ level, message, error }).then(
    (location) => {
      DEBUG_BUILD && logger.log(`console.${level} report stored at ${location}`);
    },
    (reason: unknown) => {
      DEBUG_BUILD &&
        logger.error(`Failed to store console.${level} report:`, reason);
    },
  );
}
