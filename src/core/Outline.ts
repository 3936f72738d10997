import type { NodeKind, OutlineNode, SectionData } from '../types/outline.js';

/**
 * The status outline: sections, entries, hunks and diff lines.
 *
 * Nodes live in an arena keyed by identity key and refer to each other only
 * by key. The tree is rebuilt wholesale by `replace()`; expansion, cursor and
 * selection carry over by key, never by reference or position.
 */
export class Outline {
  private nodes = new Map<string, OutlineNode>();
  private roots: string[] = [];
  private cursorKey: string | null = null;
  private selected = new Set<string>();
  private visibleCache: string[] | null = null;

  constructor(sections: SectionData[] = []) {
    this.replace(sections);
  }

  get cursor(): string | null {
    return this.cursorKey;
  }

  get(key: string): OutlineNode | undefined {
    return this.nodes.get(key);
  }

  cursorNode(): OutlineNode | undefined {
    return this.cursorKey === null ? undefined : this.nodes.get(this.cursorKey);
  }

  // --- Construction ---

  private uniqueKey(key: string): string {
    if (!this.nodes.has(key)) return key;
    let n = 2;
    while (this.nodes.has(`${key}~${n}`)) n++;
    return `${key}~${n}`;
  }

  /**
   * Rebuild the tree from fresh section data.
   */
  replace(sections: SectionData[]): void {
    const previous = this.nodes;
    const previousRoots = this.roots;
    const expandedOf = (key: string, fallback: boolean) => previous.get(key)?.expanded ?? fallback;

    this.nodes = new Map();
    this.roots = [];
    this.visibleCache = null;

    for (const section of sections) {
      const sectionKey = this.uniqueKey(section.kind === 'custom' ? `custom:${section.title}` : section.kind);
      const sectionNode: OutlineNode = {
        kind: 'section',
        key: sectionKey,
        parent: null,
        children: [],
        expanded: expandedOf(sectionKey, true),
        depth: 0,
        section: section.kind,
        title: section.title,
        entryCount: section.entries.length,
      };
      this.nodes.set(sectionKey, sectionNode);
      this.roots.push(sectionKey);

      for (const entry of section.entries) {
        const entryKey = this.uniqueKey(`${sectionKey}/${entry.id}`);
        const entryNode: OutlineNode = {
          kind: 'entry',
          key: entryKey,
          parent: sectionKey,
          children: [],
          expanded: expandedOf(entryKey, false),
          depth: 1,
          section: section.kind,
          entry,
        };
        this.nodes.set(entryKey, entryNode);
        sectionNode.children.push(entryKey);

        const preview = entry.payload.kind === 'file' ? entry.payload.preview : undefined;
        preview?.forEach((line, lineIndex) => {
          const previewKey = `${entryKey}#${lineIndex}`;
          this.nodes.set(previewKey, {
            kind: 'preview',
            key: previewKey,
            parent: entryKey,
            children: [],
            expanded: false,
            depth: 2,
            section: section.kind,
            line,
          });
          entryNode.children.push(previewKey);
        });

        const diff = entry.payload.kind === 'file' ? entry.payload.diff : null;
        if (!diff) continue;

        diff.hunks.forEach((hunk, hunkIndex) => {
          const hunkKey = this.uniqueKey(`${entryKey}:${hunk.header}`);
          const hunkNode: OutlineNode = {
            kind: 'hunk',
            key: hunkKey,
            parent: entryKey,
            children: [],
            expanded: expandedOf(hunkKey, true),
            depth: 2,
            section: section.kind,
            file: diff,
            index: hunkIndex,
          };
          this.nodes.set(hunkKey, hunkNode);
          entryNode.children.push(hunkKey);

          hunk.lines.forEach((_line, lineIndex) => {
            const lineKey = `${hunkKey}#${lineIndex}`;
            this.nodes.set(lineKey, {
              kind: 'line',
              key: lineKey,
              parent: hunkKey,
              children: [],
              expanded: false,
              depth: 3,
              section: section.kind,
              file: diff,
              hunkIndex,
              index: lineIndex,
            });
            hunkNode.children.push(lineKey);
          });
        });
      }
    }

    this.selected = new Set([...this.selected].filter((key) => this.nodes.has(key)));
    this.cursorKey = this.restoreCursor(this.cursorKey, previous, previousRoots);
    this.revealCursor();
  }

  /**
   * Where the cursor goes after a rebuild: the same key if it survived,
   * otherwise the sibling now at its old position, otherwise up the old
   * ancestry until something survives.
   */
  private restoreCursor(
    key: string | null,
    previous: Map<string, OutlineNode>,
    previousRoots: string[]
  ): string | null {
    let current = key;
    while (current !== null) {
      if (this.nodes.has(current)) return current;
      const old = previous.get(current);
      if (!old) break;

      if (old.parent === null) {
        const position = previousRoots.indexOf(current);
        if (this.roots.length > 0) {
          return this.roots[Math.max(0, Math.min(position, this.roots.length - 1))];
        }
        break;
      }

      const parent = this.nodes.get(old.parent);
      if (parent && parent.expanded && parent.children.length > 0) {
        const position = previous.get(old.parent)?.children.indexOf(current) ?? 0;
        return parent.children[Math.max(0, Math.min(position, parent.children.length - 1))];
      }
      current = old.parent;
    }
    return this.visible()[0] ?? null;
  }

  /** Move a hidden cursor to its topmost collapsed ancestor. */
  private revealCursor(): void {
    if (this.cursorKey === null) return;
    let target = this.cursorKey;
    let node = this.nodes.get(this.cursorKey);
    while (node && node.parent !== null) {
      const parent = this.nodes.get(node.parent);
      if (!parent) break;
      if (!parent.expanded) target = parent.key;
      node = parent;
    }
    this.cursorKey = target;
  }

  // --- Traversal ---

  private walk(keys: string[], out: string[], visibleOnly: boolean): void {
    for (const key of keys) {
      const node = this.nodes.get(key);
      if (!node) continue;
      out.push(key);
      if (!visibleOnly || node.expanded) this.walk(node.children, out, visibleOnly);
    }
  }

  /**
   * Flattened visible sequence: depth-first, skipping children of collapsed nodes.
   */
  visible(): string[] {
    if (!this.visibleCache) {
      const out: string[] = [];
      this.walk(this.roots, out, true);
      this.visibleCache = out;
    }
    return this.visibleCache;
  }

  private siblings(node: OutlineNode): string[] {
    if (node.parent === null) return this.roots;
    return this.nodes.get(node.parent)?.children ?? [];
  }

  isDescendant(key: string, ancestor: string): boolean {
    let node = this.nodes.get(key);
    while (node && node.parent !== null) {
      if (node.parent === ancestor) return true;
      node = this.nodes.get(node.parent);
    }
    return false;
  }

  // --- Navigation (bounded, no wraparound) ---

  private step(delta: number): boolean {
    const rows = this.visible();
    const index = this.cursorKey === null ? -1 : rows.indexOf(this.cursorKey);
    const next = index + delta;
    if (index === -1 || next < 0 || next >= rows.length) return false;
    this.cursorKey = rows[next];
    return true;
  }

  next(): boolean {
    return this.step(1);
  }

  prev(): boolean {
    return this.step(-1);
  }

  parent(): boolean {
    const node = this.cursorNode();
    if (!node || node.parent === null) return false;
    this.cursorKey = node.parent;
    return true;
  }

  /** Move into the cursor's first child, expanding the cursor node first. */
  firstChild(): boolean {
    const node = this.cursorNode();
    if (!node || node.children.length === 0) return false;
    if (!node.expanded) {
      node.expanded = true;
      this.visibleCache = null;
    }
    this.cursorKey = node.children[0];
    return true;
  }

  private stepSibling(delta: number): boolean {
    const node = this.cursorNode();
    if (!node) return false;
    const siblings = this.siblings(node);
    const next = siblings.indexOf(node.key) + delta;
    if (next < 0 || next >= siblings.length) return false;
    this.cursorKey = siblings[next];
    return true;
  }

  nextSibling(): boolean {
    return this.stepSibling(1);
  }

  prevSibling(): boolean {
    return this.stepSibling(-1);
  }

  // --- Folding ---

  /**
   * Expand or collapse one node. Nodes without children are left alone.
   */
  setExpanded(key: string, expanded: boolean): boolean {
    const node = this.nodes.get(key);
    if (!node || node.children.length === 0 || node.expanded === expanded) return false;
    node.expanded = expanded;
    this.visibleCache = null;
    if (!expanded) this.revealCursor();
    return true;
  }

  toggleFold(key: string | null = this.cursorKey): boolean {
    const node = key === null ? undefined : this.nodes.get(key);
    if (!node) return false;
    return this.setExpanded(node.key, !node.expanded);
  }

  /**
   * Fold every node of a kind: collapse all when any is expanded, otherwise expand all.
   */
  toggleFoldKind(kind: NodeKind): boolean {
    const foldable = [...this.nodes.values()].filter((n) => n.kind === kind && n.children.length > 0);
    if (foldable.length === 0) return false;
    const expand = !foldable.some((n) => n.expanded);
    for (const node of foldable) node.expanded = expand;
    this.visibleCache = null;
    this.revealCursor();
    return true;
  }

  // --- Selection ---

  isSelected(key: string): boolean {
    return this.selected.has(key);
  }

  get selectionSize(): number {
    return this.selected.size;
  }

  toggleSelect(key: string | null = this.cursorKey): boolean {
    if (key === null || !this.nodes.has(key)) return false;
    if (this.selected.has(key)) this.selected.delete(key);
    else this.selected.add(key);
    return true;
  }

  clearSelection(): boolean {
    if (this.selected.size === 0) return false;
    this.selected.clear();
    return true;
  }

  /**
   * Nodes the next action applies to: the selection in tree order, or the cursor.
   */
  targets(): string[] {
    if (this.selected.size > 0) {
      const order: string[] = [];
      this.walk(this.roots, order, false);
      return order.filter((key) => this.selected.has(key));
    }
    return this.cursorKey === null ? [] : [this.cursorKey];
  }
}
