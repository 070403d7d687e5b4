/**
 * Path helpers for entry names and folder navigation
 */

/**
 * Split an entry name into path segments, ignoring empty ones.
 * A trailing slash marks a directory entry.
 */
export function splitEntryPath(name: string): { segments: string[]; isDirectory: boolean } {
  return {
    segments: name.split('/').filter(Boolean),
    isDirectory: name.endsWith('/'),
  };
}

/**
 * Normalize a folder path: drop leading, trailing and repeated slashes
 */
export function normalizeFolderPath(path: string): string {
  return path.split('/').filter(Boolean).join('/');
}

/**
 * Check if a folder path is safe to navigate
 */
export function isPathSafe(path: string): boolean {
  // Reject paths with null bytes
  if (path.includes('\0')) {
    return false;
  }

  // Reject directory traversal segments
  return !path.split(/[\\/]/).some((segment) => segment === '..');
}
