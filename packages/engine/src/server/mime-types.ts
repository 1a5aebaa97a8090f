const MIME_TYPES: Record<string, string> = {
  // Text
  '.html': 'text/html',
  '.htm': 'text/html',
  '.css': 'text/css',
  '.js': 'application/javascript',
  '.json': 'application/json',
  '.txt': 'text/plain',

  // Images
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.svg': 'image/svg+xml',

  // Documents
  '.pdf': 'application/pdf',

  // Media
  '.mp4': 'video/mp4',
  '.webm': 'video/webm',
  '.ogg': 'video/ogg',
}

const DEFAULT_MIME_TYPE = 'application/octet-stream'

export function getMimeType(filePath: string): string {
  const slash = filePath.lastIndexOf('/')
  const dot = filePath.lastIndexOf('.')
  if (dot <= slash + 1) return DEFAULT_MIME_TYPE
  return MIME_TYPES[filePath.substring(dot).toLowerCase()] ?? DEFAULT_MIME_TYPE
}
