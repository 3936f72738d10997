/**
 * Centralized ANSI escape handling.
 *
 * Parsing turns SGR sequences embedded in git output into style spans over
 * plain text; emission turns a TextStyle back into SGR for the terminal.
 * Any other escape sequence is dropped during parsing; plain control
 * characters such as CR stay in the text.
 */

export type NamedColor =
  | 'black'
  | 'red'
  | 'green'
  | 'yellow'
  | 'blue'
  | 'magenta'
  | 'cyan'
  | 'white'
  | 'gray'
  | 'redBright'
  | 'greenBright'
  | 'yellowBright'
  | 'blueBright'
  | 'magentaBright'
  | 'cyanBright'
  | 'whiteBright';

/** Named color, 24-bit hex (`#rrggbb`) or 256-color palette index. */
export type Color = NamedColor | `#${string}` | number;

export interface TextStyle {
  fg?: Color;
  bg?: Color;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  inverse?: boolean;
}

export interface StyleSpan {
  start: number;
  end: number;
  style: TextStyle;
}

export interface AnsiText {
  text: string;
  spans: StyleSpan[];
}

// --- SGR constants ---

export const ANSI_RESET = '\x1b[0m';
export const CLEAR_SCREEN = '\x1b[2J';

/** CSI sequences, OSC strings and two-byte escapes. */
const ESCAPE_PATTERN =
  /\x1b\[([0-9;:?<=>]*)[ -/]*([@-~])|\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)?|\x1b[@-Z\\-_]/g;

const NAMED_COLORS: NamedColor[] = [
  'black',
  'red',
  'green',
  'yellow',
  'blue',
  'magenta',
  'cyan',
  'white',
];

const BRIGHT_COLORS: NamedColor[] = [
  'gray',
  'redBright',
  'greenBright',
  'yellowBright',
  'blueBright',
  'magentaBright',
  'cyanBright',
  'whiteBright',
];

function isPlain(style: TextStyle): boolean {
  return Object.keys(style).length === 0;
}

function toHex(r: number, g: number, b: number): `#${string}` {
  const part = (n: number) => Math.max(0, Math.min(255, n)).toString(16).padStart(2, '0');
  return `#${part(r)}${part(g)}${part(b)}`;
}

function without(style: TextStyle, ...keys: (keyof TextStyle)[]): TextStyle {
  const next = { ...style };
  for (const key of keys) delete next[key];
  return next;
}

/**
 * Apply one SGR parameter list to a style, returning the new style.
 * Unknown codes are ignored.
 */
export function applySgr(style: TextStyle, params: string): TextStyle {
  const codes = params === '' ? [0] : params.split(/[;:]/).map((p) => (p === '' ? 0 : Number(p)));
  let next = { ...style };

  for (let i = 0; i < codes.length; i++) {
    const code = codes[i];
    if (code === 0) next = {};
    else if (code === 1) next.bold = true;
    else if (code === 2) next.dim = true;
    else if (code === 3) next.italic = true;
    else if (code === 4) next.underline = true;
    else if (code === 7) next.inverse = true;
    else if (code === 22) next = without(next, 'bold', 'dim');
    else if (code === 23) next = without(next, 'italic');
    else if (code === 24) next = without(next, 'underline');
    else if (code === 27) next = without(next, 'inverse');
    else if (code >= 30 && code <= 37) next.fg = NAMED_COLORS[code - 30];
    else if (code >= 90 && code <= 97) next.fg = BRIGHT_COLORS[code - 90];
    else if (code === 39) next = without(next, 'fg');
    else if (code >= 40 && code <= 47) next.bg = NAMED_COLORS[code - 40];
    else if (code >= 100 && code <= 107) next.bg = BRIGHT_COLORS[code - 100];
    else if (code === 49) next = without(next, 'bg');
    else if (code === 38 || code === 48) {
      const channel = code === 38 ? 'fg' : 'bg';
      if (codes[i + 1] === 5 && i + 2 < codes.length) {
        next[channel] = codes[i + 2];
        i += 2;
      } else if (codes[i + 1] === 2 && i + 4 < codes.length) {
        next[channel] = toHex(codes[i + 2], codes[i + 3], codes[i + 4]);
        i += 4;
      }
    }
  }

  return next;
}

/**
 * Split a string into escape-free text plus the SGR styling that applied to it.
 */
export function parseAnsi(input: string): AnsiText {
  if (!input.includes('\x1b')) {
    return { text: input, spans: [] };
  }

  const spans: StyleSpan[] = [];
  let text = '';
  let style: TextStyle = {};
  let spanStart = 0;
  let lastIndex = 0;

  const flush = () => {
    if (text.length > spanStart && !isPlain(style)) {
      spans.push({ start: spanStart, end: text.length, style });
    }
    spanStart = text.length;
  };

  ESCAPE_PATTERN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = ESCAPE_PATTERN.exec(input)) !== null) {
    text += input.slice(lastIndex, match.index);
    lastIndex = match.index + match[0].length;

    if (match[2] === 'm' && match[1] !== undefined && !/[?<=>]/.test(match[1])) {
      flush();
      style = applySgr(style, match[1]);
    }
  }
  text += input.slice(lastIndex);
  flush();

  return { text, spans };
}

// --- Emission ---

function isHexColor(color: NamedColor | `#${string}`): color is `#${string}` {
  return color.startsWith('#');
}

function colorCode(color: Color, layer: 'fg' | 'bg'): string {
  if (typeof color === 'number') {
    return `${layer === 'fg' ? 38 : 48};5;${color}`;
  }
  if (isHexColor(color)) {
    const r = parseInt(color.slice(1, 3), 16);
    const g = parseInt(color.slice(3, 5), 16);
    const b = parseInt(color.slice(5, 7), 16);
    return `${layer === 'fg' ? 38 : 48};2;${r};${g};${b}`;
  }
  const base = layer === 'fg' ? 30 : 40;
  const normal = NAMED_COLORS.indexOf(color);
  if (normal !== -1) return String(base + normal);
  return String(base + 60 + BRIGHT_COLORS.indexOf(color));
}

/** Build the SGR sequence selecting exactly this style (starting from a reset). */
export function sgr(style: TextStyle): string {
  const codes = ['0'];
  if (style.bold) codes.push('1');
  if (style.dim) codes.push('2');
  if (style.italic) codes.push('3');
  if (style.underline) codes.push('4');
  if (style.inverse) codes.push('7');
  if (style.fg !== undefined) codes.push(colorCode(style.fg, 'fg'));
  if (style.bg !== undefined) codes.push(colorCode(style.bg, 'bg'));
  return `\x1b[${codes.join(';')}m`;
}

/** Absolute cursor move; row and col are 0-based. */
export function cursorTo(row: number, col: number): string {
  return `\x1b[${row + 1};${col + 1}H`;
}

export function stylesEqual(a: TextStyle, b: TextStyle): boolean {
  return (
    a.fg === b.fg &&
    a.bg === b.bg &&
    !a.bold === !b.bold &&
    !a.dim === !b.dim &&
    !a.italic === !b.italic &&
    !a.underline === !b.underline &&
    !a.inverse === !b.inverse
  );
}
