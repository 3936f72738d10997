import { describe, it, expect } from 'vitest';
import { applySgr, cursorTo, parseAnsi, sgr, stylesEqual } from './ansi.js';

describe('parseAnsi', () => {
  it('returns plain text untouched', () => {
    expect(parseAnsi(' const x = 1;')).toEqual({ text: ' const x = 1;', spans: [] });
  });

  it('turns a colored diff line into a span', () => {
    expect(parseAnsi('\x1b[32m+added\x1b[m')).toEqual({
      text: '+added',
      spans: [{ start: 0, end: 6, style: { fg: 'green' } }],
    });
  });

  it('combines multiple parameters in one sequence', () => {
    expect(parseAnsi('\x1b[1;31mdel\x1b[0m rest')).toEqual({
      text: 'del rest',
      spans: [{ start: 0, end: 3, style: { bold: true, fg: 'red' } }],
    });
  });

  it('reads 256-color and truecolor parameters', () => {
    expect(parseAnsi('\x1b[38;5;208mx').spans).toEqual([{ start: 0, end: 1, style: { fg: 208 } }]);
    expect(parseAnsi('\x1b[48;2;30;30;46mx\x1b[49my')).toEqual({
      text: 'xy',
      spans: [{ start: 0, end: 1, style: { bg: '#1e1e2e' } }],
    });
  });

  it('drops non-SGR escapes', () => {
    expect(parseAnsi('a\x1b[2Kb\x1b]8;;http://x\x07cd')).toEqual({ text: 'abcd', spans: [] });
  });

  it('keeps tabs and carriage returns', () => {
    expect(parseAnsi('\x1b[31m-\tindented\r\x1b[m').text).toBe('-\tindented\r');
    expect(parseAnsi(' crlf\r')).toEqual({ text: ' crlf\r', spans: [] });
  });

  it('opens a new span when the style changes mid-line', () => {
    const result = parseAnsi('\x1b[32m+a\x1b[7mb\x1b[27mc\x1b[m');
    expect(result.text).toBe('+abc');
    expect(result.spans).toEqual([
      { start: 0, end: 2, style: { fg: 'green' } },
      { start: 2, end: 3, style: { fg: 'green', inverse: true } },
      { start: 3, end: 4, style: { fg: 'green' } },
    ]);
  });
});

describe('applySgr', () => {
  it('clears bold and dim with 22', () => {
    expect(applySgr({ bold: true, fg: 'red' }, '22')).toEqual({ fg: 'red' });
  });

  it('maps bright foreground codes', () => {
    expect(applySgr({}, '90')).toEqual({ fg: 'gray' });
    expect(applySgr({}, '92')).toEqual({ fg: 'greenBright' });
  });

  it('resets on an empty parameter list', () => {
    expect(applySgr({ underline: true }, '')).toEqual({});
  });
});

describe('sgr', () => {
  it('emits attributes before colors', () => {
    expect(sgr({ fg: 'green', bold: true })).toBe('\x1b[0;1;32m');
  });

  it('emits bright, palette and hex colors', () => {
    expect(sgr({ fg: 'gray' })).toBe('\x1b[0;90m');
    expect(sgr({ fg: 208 })).toBe('\x1b[0;38;5;208m');
    expect(sgr({ bg: '#1e1e2e' })).toBe('\x1b[0;48;2;30;30;46m');
    expect(sgr({ bg: 'blue' })).toBe('\x1b[0;44m');
  });

  it('emits a bare reset for the plain style', () => {
    expect(sgr({})).toBe('\x1b[0m');
  });
});

describe('cursorTo', () => {
  it('converts to 1-based coordinates', () => {
    expect(cursorTo(0, 0)).toBe('\x1b[1;1H');
    expect(cursorTo(4, 10)).toBe('\x1b[5;11H');
  });
});

describe('stylesEqual', () => {
  it('treats missing and false flags alike', () => {
    expect(stylesEqual({ bold: false }, {})).toBe(true);
    expect(stylesEqual({ fg: 'red' }, { fg: 'green' })).toBe(false);
  });
});
