import type { IFileSystem } from '../interfaces/filesystem.js'
import { classifyFileSystemError, errorMessage } from '../interfaces/filesystem.js'
import { encodePathSegments, escapeHtml } from './html.js'

interface DirEntry {
  name: string
  isDirectory: boolean
}

export interface DirectoryListing {
  status: 200 | 403 | 500
  html: string
}

export interface DirectoryListingOptions {
  /** Include the OS error text when the directory cannot be read. */
  exposeErrorDetails?: boolean
}

/**
 * Render the listing page for `dirPath`, which is served at `route`
 * (decoded, relative to the root). A directory that cannot be read still
 * renders a page, with a 403 or 500 status and the error in place of the
 * entries.
 */
export async function generateDirectoryListing(
  fs: IFileSystem,
  dirPath: string,
  route: string,
  options: DirectoryListingOptions = {},
): Promise<DirectoryListing> {
  const segments = route.split('/').filter(Boolean)
  const urlPath = segments.length === 0 ? '/' : `/${segments.join('/')}/`

  const items: string[] = []
  if (segments.length > 0) {
    const parent = segments.length === 1 ? '/' : `/${segments.slice(0, -1).join('/')}/`
    items.push(
      `<li><a href="${encodePathSegments(parent)}" class="parent-dir"><span class="folder-icon"></span>Parent Directory</a></li>`,
    )
  }

  let status: DirectoryListing['status'] = 200
  let names: string[] = []
  try {
    names = await fs.readdir(dirPath)
  } catch (err) {
    const detail = options.exposeErrorDetails ? `: ${escapeHtml(errorMessage(err))}` : ''
    if (classifyFileSystemError(err) === 'permission-denied') {
      status = 403
      items.push(`<p>Access denied${detail}</p>`)
    } else {
      status = 500
      items.push(`<p>An error occurred${detail}</p>`)
    }
  }

  const entries: DirEntry[] = []
  for (const name of names) {
    const fullPath = dirPath.endsWith('/') ? dirPath + name : dirPath + '/' + name
    // Dangling symlinks and unstattable entries are listed as files.
    const isDirectory = await fs.stat(fullPath).then(
      (stat) => stat.isDirectory,
      () => false,
    )
    entries.push({ name, isDirectory })
  }

  // Directories first, then alphabetical
  entries.sort((a, b) => {
    if (a.isDirectory && !b.isDirectory) return -1
    if (!a.isDirectory && b.isDirectory) return 1
    return a.name.localeCompare(b.name)
  })

  for (const entry of entries) {
    const href = encodePathSegments(urlPath + entry.name) + (entry.isDirectory ? '/' : '')
    const icon = entry.isDirectory ? 'folder-icon' : 'file-icon'
    items.push(
      `<li><a href="${href}"><span class="${icon}"></span>${escapeHtml(entry.name)}</a></li>`,
    )
  }

  const html = `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Directory listing for ${escapeHtml(urlPath)}</title>
<style>
  body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; max-width: 800px; margin: 0 auto; padding: 20px; background-color: #f4f4f4; }
  h1 { color: #2c3e50; border-bottom: 2px solid #3498db; padding-bottom: 10px; }
  ul { list-style-type: none; padding: 0; }
  li { margin-bottom: 10px; background-color: #fff; border-radius: 4px; overflow: hidden; }
  li a { display: block; padding: 10px 15px; color: #2980b9; text-decoration: none; }
  li a:hover { background-color: #ecf0f1; }
  .parent-dir { font-weight: bold; }
  .file-icon, .folder-icon { margin-right: 10px; }
  .file-icon::before { content: "\\1F4C4"; }
  .folder-icon::before { content: "\\1F4C1"; }
</style>
</head>
<body>
<h1>Directory listing for ${escapeHtml(urlPath)}</h1>
<ul>
${items.join('\n')}
</ul>
</body>
</html>`

  return { status, html }
}
