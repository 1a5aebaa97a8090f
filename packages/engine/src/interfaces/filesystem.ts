/**
 * Abstract File System Interface
 *
 * Decouples file operations from any specific runtime. Failures reject
 * with an error carrying a Node-style `code` (ENOENT, EACCES, ...).
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileSystem {
  /** Get file statistics, following symlinks. */
  stat(path: string): Promise<IFileStat>

  /** Check if a path exists, following symlinks. */
  exists(path: string): Promise<boolean>

  /** Read directory contents. Returns list of filenames (not full paths). */
  readdir(path: string): Promise<string[]>

  /** Read a whole file into memory. */
  readFile(path: string): Promise<Uint8Array>

  /** Resolve a path to its absolute, symlink-free form. */
  realpath(path: string): Promise<string>
}

export type FileSystemErrorKind = 'permission-denied' | 'not-found' | 'other'

export function classifyFileSystemError(err: unknown): FileSystemErrorKind {
  const code =
    err && typeof err === 'object' && 'code' in err ? String(err.code) : ''
  if (code === 'EACCES' || code === 'EPERM') return 'permission-denied'
  if (code === 'ENOENT' || code === 'ENOTDIR') return 'not-found'
  return 'other'
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
