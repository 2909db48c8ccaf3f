import { describe, it, expect } from 'vitest';
import { parseMouseEvent } from './parseMouseEvent';

const plain = { shift: false, meta: false, ctrl: false };

describe('parseMouseEvent', () => {
  it('converts a left click to 0-based cells', () => {
    expect(parseMouseEvent('\x1b[<0;6;11M')).toEqual({ type: 'click', button: 'left', x: 5, y: 10, ...plain });
  });

  it('reports a release on the lowercase terminator', () => {
    expect(parseMouseEvent('\x1b[<0;6;11m')).toEqual({ type: 'release', button: 'left', x: 5, y: 10, ...plain });
  });

  it('recognizes the middle button used to close panes', () => {
    expect(parseMouseEvent('\x1b[<1;1;1M')).toEqual({ type: 'click', button: 'middle', x: 0, y: 0, ...plain });
  });

  it('maps wheel codes to scroll events', () => {
    expect(parseMouseEvent('\x1b[<64;15;5M')).toEqual({ type: 'scroll-up', button: 'none', x: 14, y: 4, ...plain });
    expect(parseMouseEvent('\x1b[<65;15;5M')).toEqual({ type: 'scroll-down', button: 'none', x: 14, y: 4, ...plain });
  });

  it('strips modifier bits from the button code', () => {
    expect(parseMouseEvent('\x1b[<20;3;4M')).toEqual({
      type: 'click',
      button: 'left',
      x: 2,
      y: 3,
      shift: true,
      meta: false,
      ctrl: true,
    });
  });

  it('parses drags', () => {
    expect(parseMouseEvent('\x1b[<34;5;5M')).toEqual({ type: 'drag', button: 'right', x: 4, y: 4, ...plain });
  });

  it('accepts a Buffer', () => {
    expect(parseMouseEvent(Buffer.from('\x1b[<0;200;50M', 'utf-8'))).toEqual({
      type: 'click',
      button: 'left',
      x: 199,
      y: 49,
      ...plain,
    });
  });

  it('returns null for other input', () => {
    expect(parseMouseEvent('hello')).toBeNull();
    expect(parseMouseEvent('\x1b[A')).toBeNull();
    expect(parseMouseEvent('')).toBeNull();
  });
});
