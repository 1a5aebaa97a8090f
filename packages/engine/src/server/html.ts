export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/** Percent-escape each segment of a URL path, keeping the slashes. */
export function encodePathSegments(urlPath: string): string {
  return urlPath.split('/').map(encodeURIComponent).join('/')
}
