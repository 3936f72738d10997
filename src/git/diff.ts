import { parseAnsi, type AnsiText, type StyleSpan } from '../utils/ansi.js';

export type LineKind = 'context' | 'addition' | 'deletion';

export interface DiffLine {
  kind: LineKind;
  /** Line text including its leading ' ', '+' or '-' marker, free of escapes. */
  text: string;
  /** Styling that came with the line (colored git output), over `text`. */
  spans: StyleSpan[];
  /** Followed by "\ No newline at end of file". */
  noEol?: boolean;
  oldLineNum?: number;
  newLineNum?: number;
}

export interface HunkRange {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  /** Trailing text after the closing @@, usually the enclosing function. */
  context: string;
}

export interface Hunk extends HunkRange {
  header: string;
  headerSpans: StyleSpan[];
  lines: DiffLine[];
}

export type FileChangeStatus = 'added' | 'deleted' | 'modified' | 'renamed' | 'copied';

export interface ParseFailure {
  reason: string;
  /** 1-based line in the parsed input. */
  line: number;
}

export interface FileDiff {
  path: string;
  oldPath?: string;
  status: FileChangeStatus;
  binary: boolean;
  unparsable?: ParseFailure;
  /** Extended header lines (diff --git, index, ---, +++ ...), escape-free. */
  headerLines: string[];
  hunks: Hunk[];
}

export const NO_EOL_MARKER = '\\ No newline at end of file';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@(?: (.*))?$/;

/**
 * Parse a unified hunk header. Omitted counts default to 1.
 */
export function parseHunkHeader(header: string): HunkRange | null {
  const match = header.match(HUNK_HEADER);
  if (!match) return null;
  return {
    oldStart: parseInt(match[1], 10),
    oldCount: match[2] === undefined ? 1 : parseInt(match[2], 10),
    newStart: parseInt(match[3], 10),
    newCount: match[4] === undefined ? 1 : parseInt(match[4], 10),
    context: match[5] ?? '',
  };
}

/**
 * Body lines of a hunk as they appeared in the diff, markers included.
 */
export function hunkLinesText(hunk: Hunk): string[] {
  const out: string[] = [];
  for (const line of hunk.lines) {
    out.push(line.text);
    if (line.noEol) out.push(NO_EOL_MARKER);
  }
  return out;
}

const C_ESCAPES: Record<string, number> = {
  a: 0x07,
  b: 0x08,
  t: 0x09,
  n: 0x0a,
  v: 0x0b,
  f: 0x0c,
  r: 0x0d,
  '"': 0x22,
  '\\': 0x5c,
};

/**
 * Decode a path git printed in C-style quotes, e.g. `"a/\303\244.txt"`.
 * Octal escapes are the bytes of the UTF-8 name. Unquoted names are returned
 * as they are.
 */
export function unquotePath(name: string): string {
  if (name.length < 2 || !name.startsWith('"') || !name.endsWith('"')) return name;

  const chars = Array.from(name.slice(1, -1));
  const bytes: number[] = [];
  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i];
    if (ch !== '\\' || i + 1 >= chars.length) {
      bytes.push(...Buffer.from(ch, 'utf8'));
      continue;
    }
    const octal = chars.slice(i + 1, i + 4).join('').match(/^[0-7]{3}/);
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
      continue;
    }
    const escaped = chars[++i];
    bytes.push(C_ESCAPES[escaped] ?? escaped.charCodeAt(0));
  }
  return Buffer.from(bytes).toString('utf8');
}

/** Name from a ---/+++ line or a git header half, without its a/ or b/ prefix. */
function stripPrefix(name: string): string {
  // A name containing a space is terminated by a tab
  const tab = name.indexOf('\t');
  const bare = tab === -1 ? name : name.slice(0, tab);
  return unquotePath(bare).replace(/^[ab]\//, '');
}

/** Index of the quote closing the quoted name at the start of `text`, or -1. */
function closingQuote(text: string): number {
  for (let i = 1; i < text.length; i++) {
    if (text[i] === '\\') i++;
    else if (text[i] === '"') return i;
  }
  return -1;
}

/**
 * Paths from `diff --git a/X b/Y`. Quoted halves are split at their quotes;
 * unquoted names may contain spaces, so symmetric names are tried before a
 * regex guess.
 */
function pathsFromGitHeader(header: string): { oldPath: string; path: string } | null {
  const rest = header.slice('diff --git '.length);

  if (rest.startsWith('"')) {
    const end = closingQuote(rest);
    if (end !== -1 && rest.charAt(end + 1) === ' ') {
      return { oldPath: stripPrefix(rest.slice(0, end + 1)), path: stripPrefix(rest.slice(end + 2)) };
    }
  } else if (rest.endsWith('"')) {
    const start = rest.lastIndexOf(' "b/');
    if (start !== -1) {
      return { oldPath: stripPrefix(rest.slice(0, start)), path: stripPrefix(rest.slice(start + 1)) };
    }
  }

  const half = (rest.length - 5) / 2;
  if (Number.isInteger(half) && half > 0) {
    const candidate = rest.slice(2, 2 + half);
    if (rest === `a/${candidate} b/${candidate}`) {
      return { oldPath: candidate, path: candidate };
    }
  }
  const match = rest.match(/^a\/(.+?) b\/(.+)$/);
  return match ? { oldPath: match[1], path: match[2] } : null;
}

function isGitFileHeader(text: string): boolean {
  return (
    text.startsWith('diff --git ') || text.startsWith('diff --cc ') || text.startsWith('diff --combined ')
  );
}

class DiffCursor {
  index = 0;

  constructor(readonly lines: AnsiText[]) {}

  get done(): boolean {
    return this.index >= this.lines.length;
  }

  peek(offset = 0): AnsiText | undefined {
    return this.lines[this.index + offset];
  }

  /** Whether the current line starts a new file section. */
  atFileStart(): boolean {
    const line = this.peek();
    if (!line) return false;
    if (isGitFileHeader(line.text)) return true;
    return line.text.startsWith('--- ') && (this.peek(1)?.text.startsWith('+++ ') ?? false);
  }
}

function parseFileHeader(cursor: DiffCursor, file: FileDiff, gitHeader: boolean): void {
  let sawNewName = false;

  while (!cursor.done) {
    const text = cursor.lines[cursor.index].text;
    if (text.startsWith('@@') || isGitFileHeader(text)) return;
    if (!gitHeader && sawNewName) return;

    if (text.startsWith('new file mode')) {
      file.status = 'added';
    } else if (text.startsWith('deleted file mode')) {
      file.status = 'deleted';
    } else if (text.startsWith('rename from ')) {
      file.status = 'renamed';
      file.oldPath = unquotePath(text.slice('rename from '.length));
    } else if (text.startsWith('rename to ')) {
      file.path = unquotePath(text.slice('rename to '.length));
    } else if (text.startsWith('copy from ')) {
      file.status = 'copied';
      file.oldPath = unquotePath(text.slice('copy from '.length));
    } else if (text.startsWith('copy to ')) {
      file.path = unquotePath(text.slice('copy to '.length));
    } else if (text.startsWith('--- ')) {
      const name = text.slice(4);
      if (name === '/dev/null') file.status = 'added';
      else if (!file.path) file.path = stripPrefix(name);
    } else if (text.startsWith('+++ ')) {
      const name = text.slice(4);
      if (name === '/dev/null') file.status = 'deleted';
      // The git header's name stands; renames and copies set theirs above
      else if (!gitHeader || !file.path) file.path = stripPrefix(name);
      sawNewName = true;
    } else if (text.startsWith('Binary files ') || text === 'GIT binary patch') {
      file.binary = true;
    } else if (!gitHeader) {
      return;
    }

    // Binary patch payloads (literal/delta blocks) are not kept.
    if (!file.binary || text.startsWith('Binary files ') || text === 'GIT binary patch') {
      file.headerLines.push(text);
    }
    cursor.index++;
  }
}

function fail(file: FileDiff, reason: string, index: number): void {
  file.unparsable = { reason, line: index + 1 };
  file.hunks = [];
}

/**
 * Parse one hunk starting at the cursor's `@@` line.
 * Returns false when the file was marked unparsable.
 */
function parseHunk(cursor: DiffCursor, file: FileDiff): boolean {
  const headerLine = cursor.lines[cursor.index];
  const headerIndex = cursor.index;

  if (headerLine.text.startsWith('@@@')) {
    fail(file, 'combined diff hunks are not supported', headerIndex);
    return false;
  }
  const range = parseHunkHeader(headerLine.text);
  if (!range) {
    fail(file, `malformed hunk header: ${headerLine.text}`, headerIndex);
    return false;
  }

  const hunk: Hunk = {
    ...range,
    header: headerLine.text,
    headerSpans: headerLine.spans,
    lines: [],
  };
  cursor.index++;

  let oldLeft = range.oldCount;
  let newLeft = range.newCount;
  let oldNum = range.oldStart;
  let newNum = range.newStart;

  while (oldLeft > 0 || newLeft > 0) {
    const line = cursor.peek();
    const marker = line?.text.charAt(0);

    if (line && (marker === ' ' || line.text === '') && oldLeft > 0 && newLeft > 0) {
      hunk.lines.push({
        kind: 'context',
        text: line.text,
        spans: line.spans,
        oldLineNum: oldNum++,
        newLineNum: newNum++,
      });
      oldLeft--;
      newLeft--;
    } else if (line && marker === '-' && oldLeft > 0) {
      hunk.lines.push({ kind: 'deletion', text: line.text, spans: line.spans, oldLineNum: oldNum++ });
      oldLeft--;
    } else if (line && marker === '+' && newLeft > 0) {
      hunk.lines.push({ kind: 'addition', text: line.text, spans: line.spans, newLineNum: newNum++ });
      newLeft--;
    } else if (line && marker === '\\' && hunk.lines.length > 0) {
      hunk.lines[hunk.lines.length - 1].noEol = true;
    } else {
      fail(
        file,
        `hunk ${hunk.header} is truncated: ${oldLeft} old and ${newLeft} new lines missing`,
        line ? cursor.index : headerIndex
      );
      return false;
    }
    cursor.index++;
  }

  if (cursor.peek()?.text.startsWith('\\') && hunk.lines.length > 0) {
    hunk.lines[hunk.lines.length - 1].noEol = true;
    cursor.index++;
  }

  file.hunks.push(hunk);
  return true;
}

function parseFile(cursor: DiffCursor): FileDiff {
  const first = cursor.lines[cursor.index].text;
  const gitHeader = isGitFileHeader(first);
  const file: FileDiff = {
    path: '',
    status: 'modified',
    binary: false,
    headerLines: [],
    hunks: [],
  };

  if (gitHeader) {
    file.headerLines.push(first);
    if (first.startsWith('diff --git ')) {
      const paths = pathsFromGitHeader(first);
      if (paths) {
        file.path = paths.path;
        if (paths.oldPath !== paths.path) file.oldPath = paths.oldPath;
      }
    } else {
      file.path = unquotePath(first.replace(/^diff --(?:cc|combined) /, ''));
    }
    cursor.index++;
  }

  parseFileHeader(cursor, file, gitHeader);

  while (!cursor.done) {
    const text = cursor.lines[cursor.index].text;
    if (isGitFileHeader(text) || (!gitHeader && cursor.atFileStart())) break;

    if (text.startsWith('@@')) {
      if (!parseHunk(cursor, file)) break;
    } else if (text === '') {
      cursor.index++;
    } else {
      fail(file, `unexpected line after hunk: ${text}`, cursor.index);
      break;
    }
  }

  if (file.unparsable) {
    while (!cursor.done && !cursor.atFileStart()) cursor.index++;
  }
  return file;
}

/**
 * Parse raw `git diff` output, optionally colored, into per-file structures.
 *
 * A malformed file is returned with `unparsable` set and no hunks; parsing
 * resumes at the next file header. Lines outside any file are ignored.
 */
export function parseDiff(raw: string): FileDiff[] {
  const input = raw.split('\n');
  if (input[input.length - 1] === '') input.pop();

  const cursor = new DiffCursor(input.map((line) => parseAnsi(line)));
  const files: FileDiff[] = [];

  while (!cursor.done) {
    if (cursor.atFileStart()) {
      files.push(parseFile(cursor));
    } else {
      cursor.index++;
    }
  }

  return files;
}
