import { describe, expect, it } from 'vitest';

import { generateReportName, uuid4 } from './misc';
import { fill } from './object';

describe('fill', () => {
  it('wraps a method around the original', () => {
    const target = {
      greet(name: string): string {
        return `hello ${name}`;
      },
    };

    fill(target, 'greet', (originalGreet) =>
      function (this: unknown, name: string): string {
        return originalGreet.call(this, name).toUpperCase();
      },
    );

    expect(target.greet('ada')).toBe('HELLO ADA');
  });

  it('leaves the object alone when the method is missing', () => {
    const target: { greet?: () => string } = {};

    fill(target, 'greet', (originalGreet) => originalGreet);

    expect('greet' in target).toBe(false);
  });
});

describe('generateReportName', () => {
  it('joins two uuid4 values', () => {
    expect(uuid4()).toMatch(/^[0-9a-f]{12}4[0-9a-f]{3}[89ab][0-9a-f]{15}$/);
    expect(generateReportName()).toMatch(/^[0-9a-f]{64}$/);
  });
});
