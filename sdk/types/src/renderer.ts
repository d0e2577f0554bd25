import type { OutputFormat, Report } from './report';

/**
 * 把报告转换为可以持久化的文本
 */
export interface ReportRenderer {
  /** 输出格式 */
  format: OutputFormat;
  /** 存储时使用的文件扩展名，不带点 */
  extension: string;
  /** 存储时使用的 Content-Type */
  contentType: string;
  render(report: Report): string;
}
