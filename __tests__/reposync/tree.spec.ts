import { describe, expect, it } from 'vitest';

import {
  buildTreeFromEntries,
  collectSelectedFiles,
  countFiles,
  countSelectedFiles,
  findNode,
  flattenVisible,
  selectionState,
  setExpandedRecursive,
  setNodeExpanded,
  toggleNodeSelection,
  type TreeEntry,
} from '@/reposync/tree';

const entries: TreeEntry[] = [
  { path: 'src/index.ts', type: 'blob', size: 120 },
  { path: 'README.md', type: 'blob', size: 40 },
  { path: 'src', type: 'tree' },
  { path: 'docs/guide/intro.md', type: 'blob' },
  { path: 'docs/guide/setup.md', type: 'blob' },
];

const visiblePaths = (root: ReturnType<typeof buildTreeFromEntries>) =>
  flattenVisible(root).map(({ node, depth }) => `${depth}:${node.path}`);

describe('buildTreeFromEntries', () => {
  it('orders directories first and synthesizes missing parents', () => {
    const root = buildTreeFromEntries(entries, 'acme/template');

    expect(root.name).toBe('acme/template');
    expect(root.children.map((child) => child.path)).toEqual(['docs', 'src', 'README.md']);
    expect(findNode(root, 'docs/guide')?.isDir).toBe(true);
    expect(findNode(root, 'src/index.ts')?.size).toBe(120);
    expect(countFiles(root)).toBe(4);
  });

  it('shows only the first level until directories are expanded', () => {
    const root = buildTreeFromEntries(entries);

    expect(visiblePaths(root)).toEqual(['1:docs', '1:src', '1:README.md']);
    expect(visiblePaths(setNodeExpanded(root, 'docs', true))).toEqual([
      '1:docs',
      '2:docs/guide',
      '1:src',
      '1:README.md',
    ]);
    expect(visiblePaths(setExpandedRecursive(root, true))).toEqual([
      '1:docs',
      '2:docs/guide',
      '3:docs/guide/intro.md',
      '3:docs/guide/setup.md',
      '1:src',
      '2:src/index.ts',
      '1:README.md',
    ]);
  });

  it('keeps the root expanded when collapsing everything', () => {
    const root = setExpandedRecursive(setExpandedRecursive(buildTreeFromEntries(entries), true), false);

    expect(root.expanded).toBe(true);
    expect(visiblePaths(root)).toEqual(['1:docs', '1:src', '1:README.md']);
  });
});

describe('selection', () => {
  it('derives directory state from the files underneath', () => {
    let root = buildTreeFromEntries(entries);
    expect(selectionState(root)).toBe('none');

    root = toggleNodeSelection(root, 'docs/guide/intro.md');
    expect(selectionState(findNode(root, 'docs') ?? root)).toBe('some');
    expect(selectionState(root)).toBe('some');
    expect(countSelectedFiles(root)).toBe(1);

    root = toggleNodeSelection(root, 'docs');
    expect(selectionState(findNode(root, 'docs') ?? root)).toBe('all');
    expect(collectSelectedFiles(root)).toEqual(['docs/guide/intro.md', 'docs/guide/setup.md']);

    root = toggleNodeSelection(root, 'docs');
    expect(collectSelectedFiles(root)).toEqual([]);
  });

  it('selects and clears the whole tree from the root', () => {
    const selected = toggleNodeSelection(buildTreeFromEntries(entries), '');

    expect(selectionState(selected)).toBe('all');
    expect(countSelectedFiles(selected)).toBe(4);
    expect(selectionState(toggleNodeSelection(selected, ''))).toBe('none');
  });

  it('reports an empty directory as unselected', () => {
    const root = buildTreeFromEntries([{ path: 'empty', type: 'tree' }]);
    const empty = toggleNodeSelection(root, 'empty');

    expect(countFiles(empty)).toBe(0);
    expect(selectionState(findNode(empty, 'empty') ?? empty)).toBe('none');
  });
});
