import { describe, expect, it } from 'vitest';

import { nodeStackLineParser } from './node-stack-trace';
import { createStackParser, getFunctionName } from './stacktrace';

const parser = createStackParser(nodeStackLineParser());

const STACK = [
  'Error: boom',
  '    at inner (/srv/app/a.js:3:9)',
  '    at outer (/srv/app/a.js:7:3)',
  '    at Module._compile (node:internal/modules/cjs/loader:1256:14)',
].join('\n');

describe('createStackParser', () => {
  it('returns frames with the outermost caller first', () => {
    const frames = parser(STACK);

    expect(frames.map((frame) => frame.function)).toEqual([
      'Module._compile',
      'outer',
      'inner',
    ]);
    expect(frames[2]).toMatchObject({ filename: '/srv/app/a.js', lineno: 3 });
  });

  it('pops the innermost frames', () => {
    const frames = parser(STACK, 0, 1);

    expect(frames.map((frame) => frame.function)).toEqual([
      'Module._compile',
      'outer',
    ]);
  });

  it('skips lines that are too long to be frames', () => {
    const stack = `    at ${'x'.repeat(1100)} (/srv/app/a.js:1:1)\n    at outer (/srv/app/a.js:7:3)`;

    expect(parser(stack).map((frame) => frame.function)).toEqual(['outer']);
  });

  it('removes webpack error wrappers', () => {
    const stack = '(error: at render (/srv/app/view.js:4:2))';

    expect(parser(stack)).toMatchObject([
      { function: 'render', filename: '/srv/app/view.js', lineno: 4 },
    ]);
  });

  it('keeps at most 50 frames', () => {
    const lines: string[] = [];
    for (let i = 0; i < 60; i++) {
      lines.push(`    at fn${i} (/srv/app/deep.js:${i + 1}:1)`);
    }

    const frames = parser(lines.join('\n'));

    expect(frames).toHaveLength(50);
    expect(frames[49]?.function).toBe('fn0');
  });
});

describe('getFunctionName', () => {
  it('returns the name of a function', () => {
    function handleRequest(): void {}

    expect(getFunctionName(handleRequest)).toBe('handleRequest');
  });

  it('falls back for values that are not functions', () => {
    expect(getFunctionName('nope')).toBe('<anonymous>');
  });
});
