import type { DiffLine, FileDiff } from '../git/diff.js';
import type { BranchInfo, CommitInfo, StashEntry } from '../git/backend.js';
import type { FileStatus } from '../git/status.js';

export type SectionKind =
  | 'untracked'
  | 'unstaged'
  | 'staged'
  | 'stashes'
  | 'recentCommits'
  | 'branches'
  | 'custom';

export type NodeKind = 'section' | 'entry' | 'hunk' | 'line' | 'preview';

export type EntryPayload =
  | {
      kind: 'file';
      path: string;
      origPath?: string;
      status: FileStatus;
      diff: FileDiff | null;
      /** Contents of an untracked file as added lines; shown, never staged piecewise. */
      preview?: DiffLine[];
    }
  | { kind: 'stash'; stash: StashEntry }
  | { kind: 'commit'; commit: CommitInfo }
  | { kind: 'branch'; branch: BranchInfo };

export interface EntryData {
  /** Stable within its section: file path, stash ref, commit hash or branch name. */
  id: string;
  label: string;
  payload: EntryPayload;
}

export interface SectionData {
  kind: SectionKind;
  title: string;
  entries: EntryData[];
}

interface NodeBase {
  key: string;
  parent: string | null;
  children: string[];
  expanded: boolean;
  depth: number;
  section: SectionKind;
}

export interface SectionNode extends NodeBase {
  kind: 'section';
  title: string;
  entryCount: number;
}

export interface EntryNode extends NodeBase {
  kind: 'entry';
  entry: EntryData;
}

export interface HunkNode extends NodeBase {
  kind: 'hunk';
  file: FileDiff;
  /** Position of the hunk within `file.hunks`. */
  index: number;
}

export interface LineNode extends NodeBase {
  kind: 'line';
  file: FileDiff;
  hunkIndex: number;
  /** Position of the line within its hunk. */
  index: number;
}

/** One read-only line of an untracked file's contents. */
export interface PreviewNode extends NodeBase {
  kind: 'preview';
  line: DiffLine;
}

export type OutlineNode = SectionNode | EntryNode | HunkNode | LineNode | PreviewNode;
