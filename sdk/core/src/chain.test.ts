import { fileURLToPath } from 'node:url';

import type { StackFrameRecord } from '@stackreport/types';
import { attachTraceback, setErrorContext } from '@stackreport/utils';
import { describe, expect, it } from 'vitest';

import {
  MAX_CHAIN_LENGTH,
  getErrorCause,
  getExceptionChain,
  getOriginModuleKind,
  getTracebackFrames,
} from './chain';

const SAMPLE = fileURLToPath(
  new URL('../test/fixtures/sample.js', import.meta.url),
);

function record(
  fn: string,
  lineno: number,
  extra: Partial<StackFrameRecord> = {},
): StackFrameRecord {
  return { filename: SAMPLE, function: fn, lineno, locals: [], ...extra };
}

function configTraceback(): StackFrameRecord[] {
  return [
    record('main', 17),
    record('loadConfig', 13, { locals: [['path', './app.json']] }),
    record('parseConfig', 6, {
      locals: [
        ['input', '  '],
        ['trimmed', ''],
      ],
    }),
  ];
}

describe('getExceptionChain', () => {
  it('follows explicit causes from the outermost error', () => {
    const root = new Error('root');
    const middle = new Error('middle', { cause: root });
    const outer = new Error('outer', { cause: middle });

    expect(getExceptionChain(outer)).toEqual([outer, middle, root]);
  });

  it('falls back to the implicit context', () => {
    const first = new Error('first');
    const second = new Error('second');
    setErrorContext(second, first);

    expect(getExceptionChain(second)).toEqual([second, first]);
    expect(getErrorCause(second)).toEqual({ cause: first, explicit: false });
  });

  it('prefers the explicit cause over the implicit context', () => {
    const cause = new Error('cause');
    const context = new Error('context');
    const error = new Error('error', { cause });
    setErrorContext(error, context);

    expect(getErrorCause(error)).toEqual({ cause, explicit: true });
  });

  it('stops at a cause cycle', () => {
    const a = new Error('a');
    const b = new Error('b', { cause: a });
    a.cause = b;

    expect(getExceptionChain(b)).toEqual([b, a]);
  });

  it('caps the number of errors it walks', () => {
    let error = new Error('0');
    for (let i = 1; i < MAX_CHAIN_LENGTH + 10; i++) {
      error = new Error(String(i), { cause: error });
    }

    expect(getExceptionChain(error)).toHaveLength(MAX_CHAIN_LENGTH);
  });

  it('does not follow causes that are not errors', () => {
    const error = new Error('outer', { cause: 'a string' });

    expect(getExceptionChain(error)).toEqual([error]);
  });

  it('returns an empty chain without an error', () => {
    expect(getExceptionChain(undefined)).toEqual([]);
    expect(getExceptionChain('not an error')).toEqual([]);
  });
});

describe('getTracebackFrames', () => {
  it('returns no frames without an error', () => {
    expect(getTracebackFrames(undefined)).toEqual([]);
  });

  it('extracts one frame per record of a single error', () => {
    const error = new Error('empty config');
    const frames = getTracebackFrames(error, configTraceback());

    expect(frames.map((frame) => frame.function_name)).toEqual([
      'main',
      'loadConfig',
      'parseConfig',
    ]);
    expect(frames[2]).toMatchObject({
      filename: SAMPLE,
      line_number: 6,
      origin_module_kind: 'user',
      cause_is_explicit: false,
      frame_identity: 3,
      locals: [
        ['input', '  '],
        ['trimmed', ''],
      ],
      source_context: {
        pre_start_line: 1,
        current_line: "    throw new Error('empty config');",
      },
    });
    expect(frames[2]?.source_context.pre_lines).toHaveLength(5);
    expect(frames[2]?.source_context.post_lines).toHaveLength(6);
  });

  it('skips frames marked as hidden', () => {
    const error = new Error('empty config');
    const traceback = [
      record('main', 17),
      record('loadConfig', 13, { hidden: true }),
      record('parseConfig', 6),
    ];
    attachTraceback(error, traceback);

    const frames = getTracebackFrames(error);

    expect(frames).toHaveLength(traceback.length - 1);
    expect(frames.map((frame) => frame.function_name)).toEqual([
      'main',
      'parseConfig',
    ]);
  });

  it('omits frames whose source is unavailable', () => {
    const error = new Error('empty config');
    const frames = getTracebackFrames(error, [
      record('main', 17),
      record('internal', 10, { filename: 'node:internal/modules/run_main' }),
      record('missing', 3, { filename: '/does/not/exist.js' }),
    ]);

    expect(frames.map((frame) => frame.function_name)).toEqual(['main']);
  });

  it('omits frames whose file declares an unknown coding', () => {
    const unknownCodec = fileURLToPath(
      new URL('../test/fixtures/unknown-codec-source.js', import.meta.url),
    );
    const frames = getTracebackFrames(new Error('empty config'), [
      record('main', 17),
      record('unreadable', 3, { filename: unknownCodec }),
    ]);

    expect(frames.map((frame) => frame.function_name)).toEqual(['main']);
  });

  it('puts the frames of the root cause before the frames of the outer error', () => {
    const inner = new Error('original problem');
    attachTraceback(inner, configTraceback());
    const outer = new Error('second problem', { cause: inner });
    attachTraceback(outer, [record('main', 17)]);

    const frames = getTracebackFrames(outer);

    expect(
      frames.map((frame) => [frame.function_name, frame.frame_identity]),
    ).toEqual([
      ['main', 1],
      ['loadConfig', 2],
      ['parseConfig', 3],
      ['main', 4],
    ]);
    for (const frame of frames.slice(0, 3)) {
      expect(frame.cause_exception).toBeUndefined();
      expect(frame.cause_is_explicit).toBe(false);
    }
    expect(frames[3]?.cause_exception).toBe(inner);
    expect(frames[3]?.cause_is_explicit).toBe(true);
  });

  it('marks frames of an error raised while handling another as implicit', () => {
    const inner = new Error('original problem');
    attachTraceback(inner, [record('parseConfig', 6)]);
    const outer = new Error('second problem');
    setErrorContext(outer, inner);
    attachTraceback(outer, [record('loadConfig', 13)]);

    const frames = getTracebackFrames(outer);

    expect(frames[1]).toMatchObject({
      function_name: 'loadConfig',
      cause_exception: inner,
      cause_is_explicit: false,
    });
  });

  it('ignores the supplied traceback when the chain has several errors', () => {
    const inner = new Error('original problem');
    attachTraceback(inner, [record('parseConfig', 6)]);
    const outer = new Error('second problem', { cause: inner });
    attachTraceback(outer, [record('loadConfig', 13)]);

    const frames = getTracebackFrames(outer, [record('main', 17)]);

    expect(frames.map((frame) => frame.function_name)).toEqual([
      'parseConfig',
      'loadConfig',
    ]);
  });

  it('continues with the next error when one has no traceback', () => {
    const inner = new Error('original problem');
    inner.stack = undefined;
    const outer = new Error('second problem', { cause: inner });
    attachTraceback(outer, [record('main', 17)]);

    const frames = getTracebackFrames(outer);

    expect(frames.map((frame) => frame.function_name)).toEqual(['main']);
  });

  it('classifies frames with the configured module prefixes', () => {
    const error = new Error('empty config');
    const frames = getTracebackFrames(
      error,
      [record('main', 17, { module: 'vendor/config/sample' })],
      { frameworkModulePrefixes: ['vendor/'] },
    );

    expect(frames[0]?.module).toBe('vendor/config/sample');
    expect(frames[0]?.origin_module_kind).toBe('framework');
  });

  it('uses the configured context size', () => {
    const error = new Error('empty config');
    const frames = getTracebackFrames(error, [record('parseConfig', 6)], {
      contextLines: 2,
    });

    expect(frames[0]?.source_context).toEqual({
      pre_start_line: 4,
      pre_lines: ['  const trimmed = input.trim();', '  if (!trimmed) {'],
      current_line: "    throw new Error('empty config');",
      post_lines: ['  }'],
    });
  });
});

describe('getOriginModuleKind', () => {
  it('classifies node internals and dependencies as framework code', () => {
    expect(getOriginModuleKind('node:internal/process/task_queues')).toBe(
      'framework',
    );
    expect(getOriginModuleKind('node_modules/express/lib/router')).toBe(
      'framework',
    );
    expect(getOriginModuleKind('src/server')).toBe('user');
  });
});
