import { beforeEach, describe, expect, it } from 'vitest'
import type { HttpResponse } from '../http/response.js'
import { InMemoryFileSystem } from '../testing/in-memory-filesystem.js'
import { decodeToString } from '../utils/buffer.js'
import { extensionClassifier } from './content-type.js'
import type { RequestHandlerOptions } from './request-handler.js'
import { RequestHandler } from './request-handler.js'

function text(response: HttpResponse): string {
  return decodeToString(response.body)
}

describe('RequestHandler', () => {
  let fs: InMemoryFileSystem

  beforeEach(() => {
    fs = new InMemoryFileSystem()
    fs.writeFile('/srv/notes.txt', 'hello')
    fs.writeFile('/srv/index.html', '<h1>hi</h1>')
    fs.writeFile('/srv/docs/a.txt', 'a')
    fs.writeFile('/srv/my file.txt', 'spaced')
  })

  function handler(options: Partial<RequestHandlerOptions> = {}): RequestHandler {
    return new RequestHandler({ root: '/srv', fs, classifier: extensionClassifier, ...options })
  }

  function get(target: string, options: Partial<RequestHandlerOptions> = {}) {
    return handler(options).handleRaw(`GET ${target} HTTP/1.1\r\nHost: localhost\r\n\r\n`)
  }

  describe('files', () => {
    it('serves a file with its type and length', async () => {
      const res = await get('/notes.txt')

      expect(res.status).toBe(200)
      expect(res.headers.get('content-type')).toBe('text/plain')
      expect(res.headers.get('content-length')).toBe('5')
      expect(text(res)).toBe('hello')
      expect(res.path).toBe('srv/notes.txt')
    })

    it('decodes percent-escapes and ignores the query string', async () => {
      expect(text(await get('/my%20file.txt'))).toBe('spaced')
      expect(text(await get('/notes.txt?v=2#top'))).toBe('hello')
    })

    it('answers 404 for a missing file', async () => {
      const res = await get('/missing.txt')

      expect(res.status).toBe(404)
      expect(res.headers.get('content-type')).toBe('text/plain')
      expect(text(res)).toBe('File not found')
    })

    it('echoes the request version in the response', async () => {
      const res = await handler().handleRaw('GET /notes.txt HTTP/2.0\r\n\r\n')

      expect(res.version).toBe('HTTP/2.0')
      expect(decodeToString(res.serialize()).split('\r\n')[0]).toBe('HTTP/2.0 200 OK')
    })

    it('uses the configured classifier', async () => {
      const res = await get('/notes.txt', {
        classifier: async (data, filePath) => `x-test/${data.length}${filePath}`,
      })

      expect(res.headers.get('content-type')).toBe('x-test/5/srv/notes.txt')
    })
  })

  describe('read failures', () => {
    it('answers 403 when the file cannot be read', async () => {
      fs.failOn('/srv/notes.txt', 'readFile', 'EACCES')

      const res = await get('/notes.txt')

      expect(res.status).toBe(403)
      expect(text(res)).toBe('Access denied')
    })

    it('appends the OS error when details are exposed', async () => {
      fs.failOn('/srv/notes.txt', 'readFile', 'EACCES')

      const res = await get('/notes.txt', { exposeErrorDetails: true })

      expect(text(res)).toBe("Access denied: EACCES: readFile '/srv/notes.txt'")
    })

    it('answers 500 for other read errors', async () => {
      fs.failOn('/srv/notes.txt', 'readFile', 'EIO')

      const res = await get('/notes.txt')

      expect(res.status).toBe(500)
      expect(text(res)).toBe('An error occurred')
    })

    it('answers 404 when the file vanishes before it is read', async () => {
      fs.failOn('/srv/notes.txt', 'readFile', 'ENOENT')

      const res = await get('/notes.txt')

      expect(res.status).toBe(404)
      expect(text(res)).toBe('File not found')
    })
  })

  describe('directories', () => {
    it('lists the root without a parent link', async () => {
      const res = await get('/')

      expect(res.status).toBe(200)
      expect(res.headers.get('content-type')).toBe('text/html')
      expect(text(res)).toContain('<li><a href="/docs/"><span class="folder-icon"></span>docs</a></li>')
      expect(text(res)).not.toContain('Parent Directory')
    })

    it('lists a subdirectory with a parent link', async () => {
      const body = text(await get('/docs'))

      expect(body).toContain('<h1>Directory listing for /docs/</h1>')
      expect(body).toContain(
        '<li><a href="/" class="parent-dir"><span class="folder-icon"></span>Parent Directory</a></li>',
      )
      expect(body).toContain('<li><a href="/docs/a.txt"><span class="file-icon"></span>a.txt</a></li>')
    })

    it('carries the listing status when the directory cannot be read', async () => {
      fs.failOn('/srv/docs', 'readdir', 'EACCES')

      const res = await get('/docs/')

      expect(res.status).toBe(403)
      expect(res.headers.get('content-type')).toBe('text/html')
      expect(text(res)).toContain('<p>Access denied</p>')
    })
  })

  describe('path safety', () => {
    it('forbids paths that resolve outside the root', async () => {
      fs.writeFile('/etc/passwd', 'root:x:0:0')

      const res = await get('/../etc/passwd')

      expect(res.status).toBe(403)
      expect(text(res)).toBe('Forbidden')
      expect(res.path).toBe('srv/../etc/passwd')
    })

    it('forbids percent-encoded traversal', async () => {
      fs.writeFile('/etc/passwd', 'root:x:0:0')

      const res = await get('/..%2F..%2Fetc%2Fpasswd')

      expect(res.status).toBe(403)
    })

    it('answers 404 when .. follows a directory that does not exist', async () => {
      const res = await get('/nope/../notes.txt')

      expect(res.status).toBe(404)
      expect(text(res)).toBe('File not found')
    })

    it('answers 404 when the path cannot be resolved', async () => {
      fs.failOn('/srv', 'realpath', 'EACCES')

      const res = await get('/notes.txt')

      expect(res.status).toBe(404)
      expect(text(res)).toBe('File not found')
    })
  })

  describe('other methods', () => {
    it('echoes an escaped POST body', async () => {
      const res = await handler().handleRaw('POST /form HTTP/1.1\r\n\r\n<b>&</b>')

      expect(res.status).toBe(200)
      expect(res.headers.get('content-type')).toBe('text/html')
      expect(text(res)).toBe(
        '<html><body><h1>Received POST request</h1><p>Body: &lt;b&gt;&amp;&lt;/b&gt;</p></body></html>',
      )
      expect(res.path).toBe('form')
    })

    it.each(['DELETE', 'HEAD', 'PUT'])('answers %s with a bodiless 400', async (method) => {
      const res = await handler().handleRaw(`${method} /x HTTP/1.1\r\n\r\n`)

      expect(res.status).toBe(400)
      expect(res.body.length).toBe(0)
      expect(res.headers.has('content-length')).toBe(false)
      expect(res.path).toBe('x')
    })

    it('answers unparseable input with 400 Invalid Request', async () => {
      const res = await handler().handleRaw('FOOBAR / HTTP/1.1\r\n\r\n')

      expect(res.status).toBe(400)
      expect(res.version).toBe('HTTP/1.1')
      expect(res.path).toBe('Invalid Request')
      expect(decodeToString(res.serialize())).toBe(
        'HTTP/1.1 400 Bad Request\r\naccept-ranges: bytes\r\n\r\n',
      )
    })
  })
})
