import { describe, it, expect } from 'vitest';
import { parseDiff } from '../git/diff.js';
import { FakeBackend, HEAD_COMMIT, TWO_HUNK_DIFF, repoStatus } from '../git/test-helpers.js';
import { buildSections, loadSnapshot, type RepoSnapshot } from './sections.js';

const NEW_FILE_DIFF = [
  'diff --git a/new.txt b/new.txt',
  'new file mode 100644',
  'index 0000000..1234567',
  '--- /dev/null',
  '+++ b/new.txt',
  '@@ -0,0 +1,2 @@',
  '+hello',
  '+world',
  '',
].join('\n');

function snapshot(partial: Partial<RepoSnapshot>): RepoSnapshot {
  return {
    status: repoStatus(),
    unstaged: [],
    staged: [],
    previews: new Map(),
    stashes: [],
    commits: [],
    branches: [],
    ...partial,
  };
}

describe('buildSections', () => {
  it('returns nothing for a clean repository', () => {
    expect(buildSections(snapshot({}))).toEqual([]);
  });

  it('orders sections and omits empty ones', () => {
    const sections = buildSections(
      snapshot({
        status: repoStatus([
          { path: 'b.txt', index: 'M', workingDir: ' ' },
          { path: 'new.txt', index: '?', workingDir: '?' },
        ]),
        commits: [HEAD_COMMIT],
        branches: [{ name: 'main', current: true, commit: 'abc1234', label: 'Initial commit' }],
      })
    );
    expect(sections.map((s) => s.title)).toEqual([
      'Untracked files',
      'Staged changes',
      'Recent commits',
      'Branches',
    ]);
  });

  it('attaches parsed diffs to file entries by path', () => {
    const [unstaged] = buildSections(
      snapshot({
        status: repoStatus([{ path: 'a.txt', index: ' ', workingDir: 'M' }]),
        unstaged: parseDiff(TWO_HUNK_DIFF),
      })
    );
    const [entry] = unstaged.entries;
    expect(entry.id).toBe('a.txt');
    expect(entry.payload.kind === 'file' && entry.payload.diff?.hunks.length).toBe(2);
  });

  it('attaches previews to untracked entries without giving them a diff', () => {
    const [untracked] = buildSections(
      snapshot({
        status: repoStatus([{ path: 'new.txt', index: '?', workingDir: '?' }]),
        previews: new Map([['new.txt', parseDiff(NEW_FILE_DIFF)[0].hunks[0].lines]]),
      })
    );
    const { payload } = untracked.entries[0];
    expect(payload.kind === 'file' && payload.diff).toBeNull();
    expect(payload.kind === 'file' && payload.preview?.map((l) => l.text)).toEqual(['+hello', '+world']);
  });

  it('labels renames, stashes, commits and branches', () => {
    const sections = buildSections(
      snapshot({
        status: repoStatus([{ path: 'new.ts', origPath: 'old.ts', index: 'R', workingDir: ' ' }]),
        stashes: [{ ref: 'stash@{0}', message: 'WIP on main: abc1234 Initial commit' }],
        commits: [HEAD_COMMIT],
        branches: [
          { name: 'feature', current: false, commit: 'def5678', label: 'Work' },
          { name: 'main', current: true, commit: 'abc1234', label: 'Initial commit' },
        ],
      })
    );
    expect(sections.map((s) => s.entries.map((e) => e.label))).toEqual([
      ['old.ts -> new.ts'],
      ['stash@{0} WIP on main: abc1234 Initial commit'],
      ['abc1234 Initial commit'],
      ['  feature', '* main'],
    ]);
  });
});

describe('loadSnapshot', () => {
  it('reads status, both diffs, stashes, commits and branches', async () => {
    const backend = new FakeBackend();
    backend.status = repoStatus([{ path: 'a.txt', index: ' ', workingDir: 'M' }]);
    backend.unstagedDiff = TWO_HUNK_DIFF;

    const result = await loadSnapshot(backend, 5);

    expect(backend.readDiff).toHaveBeenCalledWith(false);
    expect(backend.readDiff).toHaveBeenCalledWith(true);
    expect(backend.listRecentCommits).toHaveBeenCalledWith(5);
    expect(result.unstaged.map((f) => f.path)).toEqual(['a.txt']);
    expect(result.staged).toEqual([]);
  });

  it('reads previews of untracked files but not of directories', async () => {
    const backend = new FakeBackend();
    backend.status = repoStatus([
      { path: 'new.txt', index: '?', workingDir: '?' },
      { path: 'gone.txt', index: '?', workingDir: '?' },
      { path: 'build/', index: '?', workingDir: '?' },
    ]);
    backend.untrackedDiffs = { 'new.txt': NEW_FILE_DIFF };

    const result = await loadSnapshot(backend, 5);

    expect(backend.readUntrackedDiff.mock.calls).toEqual([['new.txt'], ['gone.txt']]);
    expect([...result.previews.keys()]).toEqual(['new.txt']);
    expect(result.previews.get('new.txt')?.map((l) => l.kind)).toEqual(['addition', 'addition']);
  });

  it('rejects when a read fails', async () => {
    const backend = new FakeBackend();
    backend.readStatus.mockRejectedValueOnce(new Error('not a git repository'));
    await expect(loadSnapshot(backend, 5)).rejects.toThrow('not a git repository');
  });
});
