import * as path from 'node:path'
import type { IFileSystem } from '../interfaces/filesystem.js'

export type PathSafety =
  | { kind: 'safe'; path: string }
  | { kind: 'unsafe'; path: string }
  | { kind: 'error'; path: string; cause: unknown }

/**
 * Percent-decode a request path. Query string and fragment are dropped;
 * escape sequences that do not decode to valid UTF-8 are kept as written.
 */
export function decodeRequestPath(requestPath: string): string {
  const pathPart = requestPath.split('?')[0].split('#')[0]
  return pathPart.replace(/(?:%[0-9A-Fa-f]{2})+/g, (run) => {
    try {
      return decodeURIComponent(run)
    } catch {
      return run
    }
  })
}

/**
 * Append a decoded request path to the root, dropping its leading slashes.
 * `.` and `..` stay in place for the filesystem to resolve, so a segment
 * that does not exist cannot be cancelled out by a later `..`.
 */
export function joinRequestPath(root: string, requestPath: string): string {
  const relative = decodeRequestPath(requestPath).replace(/^\/+/, '')
  if (relative === '') return root
  return root.endsWith(path.sep) ? root + relative : root + path.sep + relative
}

/** Component-wise prefix test on canonical paths. */
export function isWithinRoot(root: string, candidate: string): boolean {
  if (candidate === root) return true
  const prefix = root.endsWith(path.sep) ? root : root + path.sep
  return candidate.startsWith(prefix)
}

/**
 * Decide whether `requestPath` may be served from `root`.
 *
 * Both sides are canonicalized. A path that does not exist is judged by its
 * parent directory, so a missing file under the root is still safe (and
 * answers 404) while `..` through missing segments cannot escape.
 */
export async function checkPathSafety(
  fs: IFileSystem,
  root: string,
  requestPath: string,
): Promise<PathSafety> {
  const joined = joinRequestPath(root, requestPath)
  try {
    const canonicalRoot = await fs.realpath(root)
    const target = (await fs.exists(joined)) ? joined : path.dirname(joined)
    const canonical = await fs.realpath(target)
    return isWithinRoot(canonicalRoot, canonical)
      ? { kind: 'safe', path: joined }
      : { kind: 'unsafe', path: joined }
  } catch (cause) {
    return { kind: 'error', path: joined, cause }
  }
}
