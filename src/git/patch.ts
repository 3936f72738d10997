import { NO_EOL_MARKER, hunkLinesText, type FileDiff, type Hunk } from './diff.js';

/**
 * Patch text for `git apply`, rebuilt from parsed diffs.
 *
 * `index` lines are left out so a patch still applies after the blob ids
 * moved on (another hunk of the same file staged in between).
 */

/** The name on the other side's ---/+++ line, moved to the given prefix. */
function otherSideName(file: FileDiff, marker: '--- ' | '+++ ', prefix: 'a/' | 'b/'): string {
  const line = file.headerLines.find((l) => l.startsWith(marker) && l !== `${marker}/dev/null`);
  if (!line) return `${prefix}${file.path}`;
  // Keeps git's own quoting and tab terminator
  return line.slice(4).replace(/^("?)[ab]\//, `$1${prefix}`);
}

function patchHeader(file: FileDiff, oldCount: number, newCount: number): string[] {
  const lines: string[] = [];
  for (const line of file.headerLines) {
    if (line.startsWith('index ')) continue;

    // A partial patch of a created or removed file leaves the file in place
    if (file.status === 'added' && oldCount > 0) {
      if (line.startsWith('new file mode')) continue;
      if (line === '--- /dev/null') {
        lines.push(`--- ${otherSideName(file, '+++ ', 'a/')}`);
        continue;
      }
    }
    if (file.status === 'deleted' && newCount > 0) {
      if (line.startsWith('deleted file mode')) continue;
      if (line === '+++ /dev/null') {
        lines.push(`+++ ${otherSideName(file, '--- ', 'b/')}`);
        continue;
      }
    }
    lines.push(line);
  }
  return lines;
}

export function buildHunkPatch(file: FileDiff, hunk: Hunk): string {
  const lines = [...patchHeader(file, hunk.oldCount, hunk.newCount), hunk.header, ...hunkLinesText(hunk)];
  return lines.join('\n') + '\n';
}

/**
 * Build a patch carrying only some change lines of a hunk.
 *
 * Forward patches (staging) apply to the old side: unchosen deletions stay as
 * context and unchosen additions are dropped. Reverse patches (unstaging,
 * discarding) apply to the new side, so the roles swap.
 *
 * Returns null when none of the chosen lines is a change.
 */
export function buildLinePatch(
  file: FileDiff,
  hunk: Hunk,
  lineIndices: readonly number[],
  reverse: boolean
): string | null {
  const chosen = new Set(lineIndices);
  if (!hunk.lines.some((line, i) => chosen.has(i) && line.kind !== 'context')) {
    return null;
  }

  const body: string[] = [];
  let oldCount = 0;
  let newCount = 0;

  hunk.lines.forEach((line, i) => {
    let text = line.text;
    if (!chosen.has(i) && line.kind !== 'context') {
      const keep = line.kind === 'addition' ? reverse : !reverse;
      if (!keep) return;
      text = ' ' + text.slice(1);
    }

    if (!text.startsWith('+')) oldCount++;
    if (!text.startsWith('-')) newCount++;
    body.push(text);
    if (line.noEol) body.push(NO_EOL_MARKER);
  });

  const oldStart = oldCount > 0 && hunk.oldStart === 0 ? 1 : hunk.oldStart;
  const newStart = newCount > 0 && hunk.newStart === 0 ? 1 : hunk.newStart;
  const context = hunk.context ? ` ${hunk.context}` : '';
  const header = `@@ -${oldStart},${oldCount} +${newStart},${newCount} @@${context}`;

  return [...patchHeader(file, oldCount, newCount), header, ...body].join('\n') + '\n';
}
