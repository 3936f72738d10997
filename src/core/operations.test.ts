import { describe, it, expect, beforeEach } from 'vitest';
import { parseDiff } from '../git/diff.js';
import { TWO_HUNK_DIFF, fileDiff, repoStatus, untrackedWithPreview } from '../git/test-helpers.js';
import { Outline } from './Outline.js';
import { describeDiscard, planOperation } from './operations.js';
import { buildSections } from './sections.js';

const H1 = 'unstaged/a.txt:@@ -1,3 +1,3 @@';
const H2 = 'unstaged/a.txt:@@ -8,3 +8,4 @@ section';

function buildOutline(): Outline {
  return new Outline(
    buildSections({
      status: repoStatus([
        { path: 'new.txt', index: '?', workingDir: '?' },
        { path: 'a.txt', index: ' ', workingDir: 'M' },
        { path: 'b.txt', index: 'M', workingDir: ' ' },
      ]),
      unstaged: parseDiff(TWO_HUNK_DIFF),
      staged: parseDiff(fileDiff('b.txt', ['@@ -1 +1 @@', '-x', '+y'])),
      previews: new Map(),
      stashes: [],
      commits: [],
      branches: [],
    })
  );
}

describe('planOperation', () => {
  let outline: Outline;

  beforeEach(() => {
    outline = buildOutline();
  });

  it('stages a whole file from its entry', () => {
    expect(planOperation(outline, ['unstaged/a.txt'], 'stage')).toEqual([
      { kind: 'stagePaths', paths: ['a.txt'] },
    ]);
  });

  it('stages every entry of a section', () => {
    expect(planOperation(outline, ['untracked'], 'stage')).toEqual([
      { kind: 'stagePaths', paths: ['new.txt'] },
    ]);
  });

  it('stages one hunk as a patch', () => {
    expect(planOperation(outline, [H2], 'stage')).toEqual([
      {
        kind: 'applyPatch',
        patch: [
          'diff --git a/a.txt b/a.txt',
          '--- a/a.txt',
          '+++ b/a.txt',
          '@@ -8,3 +8,4 @@ section',
          ' eight',
          ' nine',
          '+nine and a half',
          ' ten',
          '',
        ].join('\n'),
        target: 'index',
        reverse: false,
        label: 'hunk @@ -8,3 +8,4 @@ section of a.txt',
      },
    ]);
  });

  it('unstages a hunk with a reverse patch', () => {
    const [op] = planOperation(outline, ['staged/b.txt:@@ -1 +1 @@'], 'unstage');
    expect(op).toMatchObject({ kind: 'applyPatch', target: 'index', reverse: true });
  });

  it('skips targets from sections the action does not apply to', () => {
    expect(planOperation(outline, ['staged/b.txt'], 'stage')).toEqual([]);
    expect(planOperation(outline, [H1], 'unstage')).toEqual([]);
  });

  it('unstages a section with one path operation', () => {
    expect(planOperation(outline, ['staged'], 'unstage')).toEqual([
      { kind: 'unstagePaths', paths: ['b.txt'] },
    ]);
  });

  it('groups selected lines of one hunk into a single patch', () => {
    const ops = planOperation(outline, [`${H1}#1`, `${H1}#2`], 'stage');
    expect(ops).toHaveLength(1);
    expect(ops[0]).toMatchObject({ kind: 'applyPatch', label: '2 lines of a.txt', reverse: false });
    expect(ops[0].kind === 'applyPatch' && ops[0].patch.split('\n')[3]).toBe('@@ -1,3 +1,3 @@');
  });

  it('plans nothing for context lines alone', () => {
    expect(planOperation(outline, [`${H1}#0`], 'stage')).toEqual([]);
  });

  it('does not repeat hunks under a targeted entry', () => {
    expect(planOperation(outline, ['unstaged/a.txt', H1, `${H2}#2`], 'stage')).toEqual([
      { kind: 'stagePaths', paths: ['a.txt'] },
    ]);
  });

  it('discards a hunk by identity', () => {
    const [op] = planOperation(outline, [H1], 'discard');
    expect(op).toMatchObject({
      kind: 'discard',
      label: 'hunk @@ -1,3 +1,3 @@ of a.txt',
      target: { kind: 'hunk', path: 'a.txt', header: '@@ -1,3 +1,3 @@', origin: 'unstaged' },
    });
  });

  it('stages a previewed untracked file whole and never by preview line', () => {
    const preview = new Outline(untrackedWithPreview('notes.md', ['first', 'second']));
    expect(planOperation(preview, ['untracked/notes.md#0'], 'stage')).toEqual([]);
    expect(planOperation(preview, ['untracked/notes.md'], 'stage')).toEqual([
      { kind: 'stagePaths', paths: ['notes.md'] },
    ]);
  });

  it('discards untracked files whole', () => {
    expect(planOperation(outline, ['untracked/new.txt'], 'discard')).toEqual([
      {
        kind: 'discard',
        label: 'new.txt',
        target: {
          kind: 'file',
          path: 'new.txt',
          origPath: undefined,
          origin: 'untracked',
          status: 'untracked',
        },
      },
    ]);
  });
});

describe('describeDiscard', () => {
  it('names a few targets', () => {
    const ops = planOperation(buildOutline(), [H1, 'untracked/new.txt'], 'discard');
    expect(describeDiscard(ops)).toBe('Discard hunk @@ -1,3 +1,3 @@ of a.txt, new.txt? (y/n)');
  });

  it('counts many targets', () => {
    const outline = buildOutline();
    const ops = planOperation(outline, [H1, H2, 'untracked/new.txt', 'staged/b.txt'], 'discard');
    expect(describeDiscard(ops)).toBe('Discard 4 items? (y/n)');
  });
});
