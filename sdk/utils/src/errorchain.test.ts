import type { Traceback } from '@stackreport/types';
import { describe, expect, it } from 'vitest';

import {
  annotateFrame,
  applyFrameAnnotations,
  attachTraceback,
  getAttachedTraceback,
  getErrorContext,
  getExplicitCause,
  setErrorContext,
} from './errorchain';

function makeTraceback(): Traceback {
  return [
    { filename: '/srv/app/main.js', function: 'main', lineno: 1, locals: [] },
    {
      filename: '/srv/app/parser.js',
      function: 'Parser.parse',
      lineno: 5,
      locals: [],
    },
    { filename: '/srv/app/parser.js', function: 'parse', lineno: 9, locals: [] },
  ];
}

describe('getExplicitCause', () => {
  it('returns the cause of an error', () => {
    const cause = new Error('root');

    expect(getExplicitCause(new Error('wrapper', { cause }))).toBe(cause);
  });

  it('returns undefined without a cause', () => {
    expect(getExplicitCause(new Error('alone'))).toBeUndefined();
  });
});

describe('setErrorContext', () => {
  it('records the error that was being handled', () => {
    const context = new Error('first');
    const error = new Error('second');

    setErrorContext(error, context);

    expect(getErrorContext(error)).toBe(context);
    expect(getErrorContext(context)).toBeUndefined();
  });
});

describe('attachTraceback', () => {
  it('stores the traceback next to the error', () => {
    const error = new Error('with frames');
    const traceback = makeTraceback();

    attachTraceback(error, traceback);

    expect(getAttachedTraceback(error)).toBe(traceback);
    expect(getAttachedTraceback(new Error('other'))).toBeUndefined();
  });
});

describe('applyFrameAnnotations', () => {
  it('returns the traceback unchanged without annotations', () => {
    const traceback = makeTraceback();

    expect(applyFrameAnnotations(new Error('plain'), traceback)).toBe(traceback);
  });

  it('annotates the innermost matching frame first', () => {
    const error = new Error('annotated');
    const traceback = makeTraceback();
    annotateFrame(error, 'parse', { locals: [['input', '{']] });
    annotateFrame(error, 'parse', { hidden: true });

    const annotated = applyFrameAnnotations(error, traceback);

    expect(annotated[2]?.locals).toEqual([['input', '{']]);
    expect(annotated[2]?.hidden).toBeUndefined();
    expect(annotated[1]?.hidden).toBe(true);
    expect(annotated[0]?.hidden).toBeUndefined();
    expect(traceback[2]?.locals).toEqual([]);
  });

  it('matches function names with a regular expression', () => {
    const error = new Error('annotated');
    annotateFrame(error, /^ma/, { hidden: true });

    const annotated = applyFrameAnnotations(error, makeTraceback());

    expect(annotated.map((frame) => frame.hidden)).toEqual([
      true,
      undefined,
      undefined,
    ]);
  });
});
