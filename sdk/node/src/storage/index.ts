export type { LocalStorageOptions } from './local';
export type { S3SendClient, S3StorageOptions } from './s3';

export { LocalStorage } from './local';
export { S3Storage } from './s3';
