import type { DiscardTarget, PatchTarget } from '../git/backend.js';
import type { FileDiff, Hunk } from '../git/diff.js';
import { buildHunkPatch, buildLinePatch } from '../git/patch.js';
import type { OutlineNode, SectionKind } from '../types/outline.js';
import type { Outline } from './Outline.js';

export type StagingAction = 'stage' | 'unstage' | 'discard';

/** One backend call a staging action resolves to. */
export type PlannedOp =
  | { kind: 'stagePaths'; paths: string[] }
  | { kind: 'unstagePaths'; paths: string[] }
  | { kind: 'applyPatch'; patch: string; target: PatchTarget; reverse: boolean; label: string }
  | { kind: 'discard'; target: DiscardTarget; label: string };

type ChangeOrigin = 'untracked' | 'unstaged' | 'staged';

/** Sections each action may take its targets from. */
const VALID_SECTIONS: Record<StagingAction, readonly SectionKind[]> = {
  stage: ['untracked', 'unstaged'],
  unstage: ['staged'],
  discard: ['untracked', 'unstaged', 'staged'],
};

function changeOrigin(kind: SectionKind): ChangeOrigin | null {
  return kind === 'untracked' || kind === 'unstaged' || kind === 'staged' ? kind : null;
}

function hunkOf(node: OutlineNode): { file: FileDiff; hunk: Hunk } | null {
  if (node.kind === 'hunk') return { file: node.file, hunk: node.file.hunks[node.index] };
  if (node.kind === 'line') return { file: node.file, hunk: node.file.hunks[node.hunkIndex] };
  return null;
}

/**
 * Resolve the outline targets of a staging action into backend calls.
 *
 * Sections stand for all their entries; an entry stands for the whole file,
 * so hunks and lines under a targeted entry are not planned again. Lines of
 * the same hunk become one patch. Targets outside the action's sections are
 * skipped; an empty plan means there is nothing to do.
 */
export function planOperation(
  outline: Outline,
  targets: string[],
  action: StagingAction
): PlannedOp[] {
  const valid = VALID_SECTIONS[action];
  const seen = new Set<string>();
  const nodes: OutlineNode[] = [];

  const add = (key: string) => {
    const node = outline.get(key);
    if (!node || seen.has(key) || !valid.includes(node.section)) return;
    seen.add(key);
    nodes.push(node);
  };

  for (const key of targets) {
    const node = outline.get(key);
    if (node?.kind === 'section') node.children.forEach(add);
    else add(key);
  }

  // Already covered by a targeted ancestor
  const covered = (node: OutlineNode) =>
    [...seen].some((key) => key !== node.key && outline.isDescendant(node.key, key));

  const paths: string[] = [];
  const ops: PlannedOp[] = [];
  const lineGroups = new Map<
    string,
    { file: FileDiff; hunk: Hunk; origin: 'unstaged' | 'staged'; indices: number[] }
  >();
  const reverse = action !== 'stage';

  for (const node of nodes) {
    const origin = changeOrigin(node.section);
    if (!origin || covered(node)) continue;

    if (node.kind === 'entry') {
      const payload = node.entry.payload;
      if (payload.kind !== 'file') continue;
      if (action === 'discard') {
        ops.push({
          kind: 'discard',
          label: payload.path,
          target: {
            kind: 'file',
            path: payload.path,
            origPath: payload.origPath,
            origin,
            status: payload.status,
          },
        });
      } else {
        paths.push(payload.path);
        if (action === 'unstage' && payload.origPath) paths.push(payload.origPath);
      }
      continue;
    }

    const located = hunkOf(node);
    if (!located || origin === 'untracked') continue;

    if (node.kind === 'line') {
      const hunkKey = node.parent ?? node.key;
      const group = lineGroups.get(hunkKey);
      if (group) group.indices.push(node.index);
      else lineGroups.set(hunkKey, { ...located, origin, indices: [node.index] });
      continue;
    }

    const { file, hunk } = located;
    const patch = buildHunkPatch(file, hunk);
    const label = `hunk ${hunk.header} of ${file.path}`;
    if (action === 'discard') {
      ops.push({
        kind: 'discard',
        label,
        target: { kind: 'hunk', path: file.path, header: hunk.header, patch, origin },
      });
    } else {
      ops.push({ kind: 'applyPatch', patch, target: 'index', reverse, label });
    }
  }

  for (const { file, hunk, origin, indices } of lineGroups.values()) {
    const patch = buildLinePatch(file, hunk, indices, reverse);
    if (patch === null) continue;
    const label = `${indices.length} ${indices.length === 1 ? 'line' : 'lines'} of ${file.path}`;
    if (action === 'discard') {
      ops.push({
        kind: 'discard',
        label,
        target: { kind: 'lines', path: file.path, header: hunk.header, patch, origin },
      });
    } else {
      ops.push({ kind: 'applyPatch', patch, target: 'index', reverse, label });
    }
  }

  if (paths.length > 0) {
    ops.unshift(action === 'stage' ? { kind: 'stagePaths', paths } : { kind: 'unstagePaths', paths });
  }
  return ops;
}

function opLabel(op: PlannedOp): string {
  if (op.kind === 'stagePaths' || op.kind === 'unstagePaths') return op.paths.join(', ');
  return op.label;
}

/**
 * Confirmation prompt for a planned discard.
 */
export function describeDiscard(ops: PlannedOp[]): string {
  const subject = ops.length > 3 ? `${ops.length} items` : ops.map(opLabel).join(', ');
  return `Discard ${subject}? (y/n)`;
}
