import { FolderNotFoundError } from '@/errors';
import type { ArchiveEntry } from '@/types/zip';
import { normalizeFolderPath, splitEntryPath } from '@/utils/zip-utils';

export interface FolderNode {
  kind: 'folder';
  children: Map<string, TreeNode>;
}

export interface FileNode {
  kind: 'file';
  size: number;
}

export type TreeNode = FolderNode | FileNode;

export type FolderItem =
  | { kind: 'folder'; name: string; itemCount: number }
  | { kind: 'file'; name: string; size: number };

function createFolder(): FolderNode {
  return { kind: 'folder', children: new Map() };
}

/**
 * Build a nested folder structure from entry names.
 *
 * Children keep the order in which they first appear in the entry list. When a
 * name is used both as a file and as a folder prefix, the folder wins.
 */
export function buildFolderTree(entries: readonly ArchiveEntry[]): FolderNode {
  const root = createFolder();

  for (const entry of entries) {
    const { segments, isDirectory } = splitEntryPath(entry.name);
    const folderSegments = isDirectory ? segments : segments.slice(0, -1);

    let current = root;
    for (const segment of folderSegments) {
      const child = current.children.get(segment);
      if (child?.kind === 'folder') {
        current = child;
      } else {
        const folder = createFolder();
        current.children.set(segment, folder);
        current = folder;
      }
    }

    const fileName = segments[segments.length - 1];
    if (!isDirectory && fileName !== undefined && current.children.get(fileName)?.kind !== 'folder') {
      current.children.set(fileName, { kind: 'file', size: entry.size });
    }
  }

  return root;
}

/**
 * Resolve a `/`-separated folder path within the tree.
 */
export function findFolder(tree: FolderNode, path: string): FolderNode {
  const normalized = normalizeFolderPath(path);
  let current = tree;

  for (const segment of normalized ? normalized.split('/') : []) {
    const child = current.children.get(segment);
    if (child?.kind !== 'folder') {
      throw new FolderNotFoundError(normalized);
    }
    current = child;
  }
  return current;
}

/**
 * List the items of one folder, in tree order.
 */
export function listFolder(tree: FolderNode, path = ''): FolderItem[] {
  const folder = findFolder(tree, path);

  return [...folder.children].map(([name, node]): FolderItem =>
    node.kind === 'folder'
      ? { kind: 'folder', name, itemCount: node.children.size }
      : { kind: 'file', name, size: node.size }
  );
}
