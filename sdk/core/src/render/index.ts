import type { OutputFormat, ReportRenderer } from '@stackreport/types';

import { htmlRenderer } from './html';
import { jsonRenderer } from './json';

const RENDERERS: Record<OutputFormat, ReportRenderer> = {
  html: htmlRenderer,
  json: jsonRenderer,
};

/**
 * 按输出格式返回渲染器，默认为 html
 */
export function getRenderer(format: OutputFormat = 'html'): ReportRenderer {
  return RENDERERS[format];
}

export { htmlRenderer, renderHtmlReport } from './html';
export { jsonRenderer, renderJsonReport } from './json';
export { TRACEBACK_HEADER, formatExceptionOnly, formatFrames } from './text';
