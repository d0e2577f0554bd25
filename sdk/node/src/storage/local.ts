import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import type { ReportStorage } from '@stackreport/types';

export interface LocalStorageOptions {
  /** 报告写入的目录，不存在时会自动创建 */
  outputPath: string;
}

/**
 * 把报告写到本地文件系统，文件名为 `<name>.<extension>`
 */
export class LocalStorage implements ReportStorage {
  public readonly outputPath: string;

  public constructor(options: LocalStorageOptions) {
    this.outputPath = options.outputPath;
  }

  /**
   * @inheritDoc
   */
  public async write(
    name: string,
    extension: string,
    body: string,
    _contentType: string,
  ): Promise<string> {
    await mkdir(this.outputPath, { recursive: true });

    const filePath = join(this.outputPath, `${name}.${extension}`);
    await writeFile(filePath, body, 'utf-8');
    return filePath;
  }
}
