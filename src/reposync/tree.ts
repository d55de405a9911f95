import path from 'node:path';

import type { TreeNode } from '@/reposync/types';

export type TreeEntry = {
  path: string;
  type: 'blob' | 'tree';
  size?: number;
};

export type SelectionState = 'all' | 'some' | 'none';

export type VisibleTreeRow = {
  node: TreeNode;
  depth: number;
};

export const createTreeNode = (
  nodePath: string,
  isDir: boolean,
  children: TreeNode[] = [],
  size?: number,
): TreeNode => ({
  path: nodePath,
  name: nodePath ? path.posix.basename(nodePath) : '/',
  isDir,
  children,
  expanded: nodePath === '',
  selected: false,
  ...(size === undefined ? {} : { size }),
});

const compareNodes = (left: TreeNode, right: TreeNode): number => {
  if (left.isDir !== right.isDir) {
    return left.isDir ? -1 : 1;
  }
  if (left.name === right.name) {
    return 0;
  }
  return left.name < right.name ? -1 : 1;
};

/** Directories first, then by name, at every level. */
export const sortTree = (node: TreeNode): TreeNode => ({
  ...node,
  children: node.children.map(sortTree).sort(compareNodes),
});

/**
 * Builds a tree from flat `owner/repo` tree entries. Parents missing from the
 * listing (truncated responses) are synthesized as directories.
 */
export const buildTreeFromEntries = (entries: TreeEntry[], rootName = '/'): TreeNode => {
  type MutableNode = TreeNode & { children: MutableNode[] };

  const root: MutableNode = { ...createTreeNode('', true), name: rootName, children: [] };
  const byPath = new Map<string, MutableNode>([['', root]]);

  const ensureDirectory = (dirPath: string): MutableNode => {
    const existing = byPath.get(dirPath);
    if (existing) {
      return existing;
    }

    const parentPath = path.posix.dirname(dirPath);
    const parent = ensureDirectory(parentPath === '.' ? '' : parentPath);
    const node: MutableNode = { ...createTreeNode(dirPath, true), children: [] };
    parent.children.push(node);
    byPath.set(dirPath, node);
    return node;
  };

  const sorted = [...entries].sort((left, right) => (left.path < right.path ? -1 : 1));

  for (const entry of sorted) {
    if (!entry.path || byPath.has(entry.path)) {
      continue;
    }

    if (entry.type === 'tree') {
      ensureDirectory(entry.path);
      continue;
    }

    const parentPath = path.posix.dirname(entry.path);
    const parent = ensureDirectory(parentPath === '.' ? '' : parentPath);
    const node: MutableNode = { ...createTreeNode(entry.path, false, [], entry.size), children: [] };
    parent.children.push(node);
    byPath.set(entry.path, node);
  }

  return sortTree(root);
};

export const setSelectedRecursive = (node: TreeNode, selected: boolean): TreeNode => ({
  ...node,
  selected,
  children: node.children.map((child) => setSelectedRecursive(child, selected)),
});

export const countFiles = (node: TreeNode): number =>
  node.isDir
    ? node.children.reduce((total, child) => total + countFiles(child), 0)
    : 1;

export const countSelectedFiles = (node: TreeNode): number =>
  node.isDir
    ? node.children.reduce((total, child) => total + countSelectedFiles(child), 0)
    : Number(node.selected);

/**
 * Display state of a node. Directories never report their own flag: the
 * answer always comes from the file leaves underneath.
 */
export const selectionState = (node: TreeNode): SelectionState => {
  if (!node.isDir) {
    return node.selected ? 'all' : 'none';
  }

  const total = countFiles(node);
  const selected = countSelectedFiles(node);

  if (total === 0 || selected === 0) {
    return 'none';
  }
  return selected === total ? 'all' : 'some';
};

export const collectSelectedFiles = (node: TreeNode): string[] => {
  if (!node.isDir) {
    return node.selected ? [node.path] : [];
  }
  return node.children.flatMap(collectSelectedFiles);
};

const updateNode = (
  node: TreeNode,
  targetPath: string,
  apply: (target: TreeNode) => TreeNode,
): TreeNode => {
  if (node.path === targetPath) {
    return apply(node);
  }

  if (!node.isDir || (node.path !== '' && !targetPath.startsWith(`${node.path}/`))) {
    return node;
  }

  return {
    ...node,
    children: node.children.map((child) => updateNode(child, targetPath, apply)),
  };
};

export const findNode = (node: TreeNode, targetPath: string): TreeNode | undefined => {
  if (node.path === targetPath) {
    return node;
  }
  for (const child of node.children) {
    const found = findNode(child, targetPath);
    if (found) {
      return found;
    }
  }
  return undefined;
};

/** A fully selected node becomes deselected; anything else becomes fully selected. */
export const toggleNodeSelection = (root: TreeNode, targetPath: string): TreeNode =>
  updateNode(root, targetPath, (target) =>
    setSelectedRecursive(target, selectionState(target) !== 'all'),
  );

export const setNodeExpanded = (root: TreeNode, targetPath: string, expanded: boolean): TreeNode =>
  updateNode(root, targetPath, (target) => (target.isDir ? { ...target, expanded } : target));

export const setExpandedRecursive = (node: TreeNode, expanded: boolean): TreeNode => {
  if (!node.isDir) {
    return node;
  }
  return {
    ...node,
    expanded: node.path === '' ? true : expanded,
    children: node.children.map((child) => setExpandedRecursive(child, expanded)),
  };
};

/** Rows shown in the browser: the root is hidden and collapsed directories hide their children. */
export const flattenVisible = (root: TreeNode): VisibleTreeRow[] => {
  const rows: VisibleTreeRow[] = [];

  const visit = (node: TreeNode, depth: number) => {
    if (node.path !== '') {
      rows.push({ node, depth });
    }
    if (node.isDir && (node.path === '' || node.expanded)) {
      for (const child of node.children) {
        visit(child, depth + 1);
      }
    }
  };

  visit(root, 0);
  return rows;
};
