import type {
  RenderedReportFrame,
  Report,
  ReportRenderer,
} from '@stackreport/types';
import { escapeHtml, getExceptionMessage } from '@stackreport/utils';

import { TRACEBACK_HEADER, formatExceptionOnly, formatFrames } from './text';

const STYLE = `
  html * { padding:0; margin:0; }
  body * { padding:10px 20px; }
  body * * { padding:0; }
  body { font:small sans-serif; background:#eee; color:#000; }
  body>div { border-bottom:1px solid #ddd; }
  h1 { font-weight:normal; margin-bottom:.4em; }
  h1 span { font-size:60%; color:#666; font-weight:normal; }
  h2 { margin-bottom:.8em; }
  h3 { margin:1em 0 .5em 0; }
  table { border:none; border-collapse: collapse; width:100%; }
  td, th { vertical-align:top; padding:2px 3px; }
  th { width:12em; text-align:right; color:#666; padding-right:.5em; }
  table.vars { margin:5px 0 2px 40px; }
  table.vars td, table.req td { font-family:monospace; }
  table td.code { width:100%; }
  table td.code pre { overflow:hidden; }
  ul.traceback { list-style-type:none; color: #222; }
  ul.traceback li.frame { padding-bottom:1em; color:#666; }
  ul.traceback li.user { background-color:#e0e0e0; color:#000 }
  div.context { padding:10px 0; overflow:hidden; }
  div.context ol { padding-left:30px; margin:0 10px; list-style-position: inside; }
  div.context ol li { font-family:monospace; white-space:pre; color:#777; cursor:pointer; padding-left: 2px; }
  div.context ol li pre { display:inline; }
  div.context ol.context-line li { color:#464646; background-color:#dfdfdf; padding: 3px 2px; }
  div.context ol.context-line li span { position:absolute; right:32px; }
  .user div.context ol.context-line li { background-color:#bbb; color:#000; }
  .user div.context ol li { color:#666; }
  div.commands { margin-left: 40px; }
  #summary { background: #ffc; }
  #summary h2 { font-weight: normal; color: #666; }
  #traceback { background:#eee; }
  #unicode-hint { background:#eee; }
  span.commands a:link {color:#5E5694;}
  pre.exception_value { font-family: sans-serif; color: #575757; font-size: 1.5em; margin: 10px 0 10px 0; }
`;

/**
 * 起因发生变化时，在两组帧之间插入的说明
 */
function renderCauseHeading(frame: RenderedReportFrame): string {
  const cause = escapeHtml(getExceptionMessage(frame.cause_exception));
  return frame.cause_is_explicit
    ? `<li><h3>The above exception (${cause}) was the direct cause of the following exception:</h3></li>`
    : `<li><h3>During handling of the above exception (${cause}), another exception occurred:</h3></li>`;
}

function renderContextLines(
  lines: readonly string[],
  start: number,
  className: string,
): string {
  if (!lines.length) {
    return '';
  }
  const items = lines
    .map((line) => `<li><pre>${escapeHtml(line)}</pre></li>`)
    .join('');
  return `<ol start="${start}" class="${className}">${items}</ol>`;
}

function renderFrame(frame: RenderedReportFrame): string {
  const { source_context: context } = frame;

  // 局部变量在组装报告时已经转义过，这里直接输出
  const vars = frame.locals.length
    ? `<table class="vars" id="v${frame.frame_identity}">
        <thead><tr><th>Variable</th><th>Value</th></tr></thead>
        <tbody>${frame.locals
          .map(
            ([name, value]) =>
              `<tr><td>${escapeHtml(name)}</td><td class="code"><pre>${value}</pre></td></tr>`,
          )
          .join('')}</tbody>
      </table>`
    : '';

  return `<li class="frame ${frame.origin_module_kind}">
      <code>${escapeHtml(frame.filename)}</code> in <code>${escapeHtml(frame.function_name)}</code>
      <div class="context" id="c${frame.frame_identity}">
        ${renderContextLines(context.pre_lines, context.pre_start_line, 'pre-context')}
        <ol start="${frame.line_number}" class="context-line"><li><pre>${escapeHtml(context.current_line)}</pre></li></ol>
        ${renderContextLines(context.post_lines, frame.line_number + 1, 'post-context')}
      </div>
      ${vars}
    </li>`;
}

function renderFrames(frames: readonly RenderedReportFrame[]): string {
  const items: string[] = [];
  let previousCause: unknown = undefined;

  // 根因的起因可能不是 Error 或者已经出现过，它没有自己的帧，第一帧前面不放说明
  frames.forEach((frame, index) => {
    if (
      index > 0 &&
      frame.cause_exception !== undefined &&
      frame.cause_exception !== previousCause
    ) {
      items.push(renderCauseHeading(frame));
    }
    previousCause = frame.cause_exception;
    items.push(renderFrame(frame));
  });

  return items.join('\n');
}

function renderSummary(report: Report): string {
  const title = report.exception_type
    ? escapeHtml(report.exception_type)
    : 'Report';
  const lastFrame = report.last_frame;

  const rows: Array<[string, string | undefined]> = [
    ['Exception Type', report.exception_type],
    ['Exception Value', report.exception_value],
    [
      'Exception Location',
      lastFrame
        ? `${lastFrame.filename} in ${lastFrame.function_name}, line ${lastFrame.line_number}`
        : undefined,
    ],
    ['Executable', report.process_executable],
    ['Runtime Version', report.runtime_version],
    ['Platform', report.platform],
    ['Process ID', String(report.pid)],
    ['Working Directory', report.cwd],
    ['Arguments', report.argv.join(' ')],
    ['Server time', report.server_time],
  ];

  return `<div id="summary">
  <h1>${title}</h1>
  <pre class="exception_value">${report.exception_value ? escapeHtml(report.exception_value) : 'No exception message supplied'}</pre>
  <table class="meta">
    ${rows
      .filter((row): row is [string, string] => row[1] !== undefined)
      .map(([key, value]) => `<tr><th>${key}:</th><td><pre>${escapeHtml(value)}</pre></td></tr>`)
      .join('\n    ')}
  </table>
</div>`;
}

/**
 * 纯文本形式的调用栈，方便复制
 */
function renderPlainTraceback(report: Report): string {
  const lines = [
    TRACEBACK_HEADER,
    ...formatFrames(report.frames),
    ...formatExceptionOnly(report.exception_type, report.exception_value),
  ];
  return escapeHtml(lines.join(''));
}

/**
 * 把报告渲染为一个独立的 HTML 页面
 */
export function renderHtmlReport(report: Report): string {
  const hint = report.unicode_hint
    ? `<div id="unicode-hint">
  <h2>Unicode error hint</h2>
  <p>The string that could not be encoded/decoded was: <strong>${escapeHtml(report.unicode_hint)}</strong></p>
</div>`
    : '';

  const traceback = report.frames.length
    ? `<div id="traceback">
  <h2>Traceback</h2>
  <ul class="traceback">
${renderFrames(report.frames)}
  </ul>
  <h3>Plain traceback</h3>
  <pre id="traceback_area">${renderPlainTraceback(report)}</pre>
</div>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta http-equiv="content-type" content="text/html; charset=utf-8">
  <meta name="robots" content="NONE,NOARCHIVE">
  <title>${report.exception_type ? escapeHtml(report.exception_type) : 'Report'}${report.last_frame ? ` at ${escapeHtml(report.last_frame.function_name)}` : ''}</title>
  <style type="text/css">${STYLE}</style>
</head>
<body>
${renderSummary(report)}
${hint}
${traceback}
</body>
</html>
`;
}

export const htmlRenderer: ReportRenderer = {
  format: 'html',
  extension: 'html',
  contentType: 'text/html; charset=utf-8',
  render: renderHtmlReport,
};
