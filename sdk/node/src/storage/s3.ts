import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { ReportStorage } from '@stackreport/types';
import { ReporterError } from '@stackreport/utils';

/**
 * S3Storage 只需要客户端的 send 方法，测试时可以传入进程内的替身
 */
export interface S3SendClient {
  send(command: PutObjectCommand): Promise<unknown>;
}

export interface S3StorageOptions {
  accessKey?: string;
  secretKey?: string;
  /** 报告写入的存储桶 */
  bucket: string;
  /**
   * 对象键的前缀，例如 `reports/`
   * 默认为空
   */
  prefix?: string;
  region?: string;
  /** 自定义客户端，传入时忽略上面的凭证和区域 */
  client?: S3SendClient;
}

/**
 * 把报告上传到 S3 兼容的对象存储，对象键为 `<prefix><name>.<extension>`
 *
 * 重试和退避交给 AWS SDK 自己的重试策略
 */
export class S3Storage implements ReportStorage {
  private readonly _bucket: string;
  private readonly _prefix: string;
  private readonly _client: S3SendClient;

  public constructor(options: S3StorageOptions) {
    if (!options.bucket) {
      throw new ReporterError('S3Storage requires a bucket', 'error');
    }

    this._bucket = options.bucket;
    this._prefix = options.prefix || '';
    this._client = options.client || createS3Client(options);
  }

  /**
   * @inheritDoc
   */
  public async write(
    name: string,
    extension: string,
    body: string,
    contentType: string,
  ): Promise<string> {
    const key = `${this._prefix}${name}.${extension}`;

    await this._client.send(
      new PutObjectCommand({
        Bucket: this._bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );

    return `s3://${this._bucket}/${key}`;
  }
}

function createS3Client(options: S3StorageOptions): S3Client {
  const { accessKey, secretKey, region } = options;

  return new S3Client({
    region,
    // 没有显式提供凭证时走 AWS SDK 默认的凭证链（环境变量、配置文件等）
    credentials:
      accessKey && secretKey
        ? { accessKeyId: accessKey, secretAccessKey: secretKey }
        : undefined,
  });
}
