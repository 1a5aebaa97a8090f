import { describe, expect, it } from 'vitest'
import { InMemoryFileSystem } from '../testing/in-memory-filesystem.js'
import { generateDirectoryListing } from './directory-listing.js'

function listItems(html: string): string[] {
  return html.split('\n').filter((line) => line.startsWith('<li>'))
}

describe('generateDirectoryListing', () => {
  it('lists folders first, then files, each with its icon', async () => {
    const fs = new InMemoryFileSystem()
    fs.writeFile('/srv/docs/b.txt', 'b')
    fs.writeFile('/srv/docs/a.txt', 'a')
    fs.mkdir('/srv/docs/sub')

    const listing = await generateDirectoryListing(fs, '/srv/docs', 'docs')

    expect(listing.status).toBe(200)
    expect(listItems(listing.html)).toEqual([
      '<li><a href="/" class="parent-dir"><span class="folder-icon"></span>Parent Directory</a></li>',
      '<li><a href="/docs/sub/"><span class="folder-icon"></span>sub</a></li>',
      '<li><a href="/docs/a.txt"><span class="file-icon"></span>a.txt</a></li>',
      '<li><a href="/docs/b.txt"><span class="file-icon"></span>b.txt</a></li>',
    ])
    expect(listing.html).toContain('<title>Directory listing for /docs/</title>')
  })

  it('omits the parent link at the root', async () => {
    const fs = new InMemoryFileSystem()
    fs.writeFile('/srv/a.txt', 'a')

    const listing = await generateDirectoryListing(fs, '/srv', '')

    expect(listItems(listing.html)).toEqual([
      '<li><a href="/a.txt"><span class="file-icon"></span>a.txt</a></li>',
    ])
  })

  it('links a nested directory to its parent directory', async () => {
    const fs = new InMemoryFileSystem()
    fs.mkdir('/srv/a/b')

    const listing = await generateDirectoryListing(fs, '/srv/a/b', 'a/b/')

    expect(listItems(listing.html)[0]).toBe(
      '<li><a href="/a/" class="parent-dir"><span class="folder-icon"></span>Parent Directory</a></li>',
    )
  })

  it('escapes entry names in text and in hrefs', async () => {
    const fs = new InMemoryFileSystem()
    fs.writeFile('/srv/<script>.txt', 'x')
    fs.writeFile('/srv/a b#.txt', 'y')

    const listing = await generateDirectoryListing(fs, '/srv', '')

    expect(listItems(listing.html)).toEqual([
      '<li><a href="/%3Cscript%3E.txt"><span class="file-icon"></span>&lt;script&gt;.txt</a></li>',
      '<li><a href="/a%20b%23.txt"><span class="file-icon"></span>a b#.txt</a></li>',
    ])
  })

  it('downgrades to 403 when the directory cannot be read', async () => {
    const fs = new InMemoryFileSystem()
    fs.mkdir('/srv/private')
    fs.failOn('/srv/private', 'readdir', 'EACCES')

    const listing = await generateDirectoryListing(fs, '/srv/private', 'private')

    expect(listing.status).toBe(403)
    expect(listing.html).toContain('<p>Access denied</p>')
  })

  it('downgrades to 500 on other errors, with details only when enabled', async () => {
    const fs = new InMemoryFileSystem()
    fs.mkdir('/srv/docs')
    fs.failOn('/srv/docs', 'readdir', 'EIO')

    const hidden = await generateDirectoryListing(fs, '/srv/docs', 'docs')
    expect(hidden.status).toBe(500)
    expect(hidden.html).toContain('<p>An error occurred</p>')

    const exposed = await generateDirectoryListing(fs, '/srv/docs', 'docs', {
      exposeErrorDetails: true,
    })
    expect(exposed.html).toContain('<p>An error occurred: EIO: readdir &#39;/srv/docs&#39;</p>')
  })
})
