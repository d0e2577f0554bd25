import type { Report, ReportRenderer } from '@stackreport/types';
import { getExceptionMessage, getExceptionTypeName } from '@stackreport/utils';

/**
 * cause_exception 可能是任意值（包括带循环引用的对象），序列化为类型名和错误信息
 */
function replacer(key: string, value: unknown): unknown {
  if (key === 'cause_exception' && value !== undefined) {
    return {
      type: getExceptionTypeName(value),
      message: getExceptionMessage(value),
    };
  }
  return value;
}

/**
 * 把报告序列化为 JSON，字段名与报告结构一致
 */
export function renderJsonReport(report: Report): string {
  return JSON.stringify(report, replacer, 2);
}

export const jsonRenderer: ReportRenderer = {
  format: 'json',
  extension: 'json',
  contentType: 'application/json',
  render: renderJsonReport,
};
