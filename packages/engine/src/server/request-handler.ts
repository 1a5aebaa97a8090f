import { HttpRequestParseError, parseHttpRequest } from '../http/request-parser.js'
import { HttpResponse } from '../http/response.js'
import type { HttpRequest, StatusCode } from '../http/types.js'
import type { IFileStat, IFileSystem } from '../interfaces/filesystem.js'
import { classifyFileSystemError, errorMessage } from '../interfaces/filesystem.js'
import type { Logger } from '../logging/logger.js'
import { silentLogger } from '../logging/logger.js'
import type { ContentTypeClassifier } from './content-type.js'
import { sniffingClassifier } from './content-type.js'
import { generateDirectoryListing } from './directory-listing.js'
import { escapeHtml } from './html.js'
import { checkPathSafety, decodeRequestPath } from './path-resolver.js'

export interface RequestHandlerOptions {
  root: string
  fs: IFileSystem
  classifier?: ContentTypeClassifier
  /** Append OS error text to 403/500 bodies. */
  exposeErrorDetails?: boolean
  logger?: Logger
}

/** The 400 sent when a request cannot be parsed at all. */
export function invalidRequestResponse(): HttpResponse {
  return new HttpResponse('HTTP/1.1', 400, 'Invalid Request')
}

/**
 * Turns parsed requests into responses. Knows nothing about sockets, so the
 * same handler serves any connection model.
 */
export class RequestHandler {
  private root: string
  private fs: IFileSystem
  private classifier: ContentTypeClassifier
  private exposeErrorDetails: boolean
  private logger: Logger

  constructor(options: RequestHandlerOptions) {
    this.root = options.root
    this.fs = options.fs
    this.classifier = options.classifier ?? sniffingClassifier
    this.exposeErrorDetails = options.exposeErrorDetails ?? false
    this.logger = options.logger ?? silentLogger()
  }

  /** Parse `raw` and handle it; unparseable input gets a 400. */
  async handleRaw(raw: string): Promise<HttpResponse> {
    let request: HttpRequest
    try {
      request = parseHttpRequest(raw)
    } catch (err) {
      if (!(err instanceof HttpRequestParseError)) throw err
      this.logger.debug(`Failed to parse request: ${err.message}`)
      return invalidRequestResponse()
    }
    return this.handle(request)
  }

  async handle(request: HttpRequest): Promise<HttpResponse> {
    switch (request.method) {
      case 'GET':
        return this.handleGet(request)
      case 'POST':
        return this.handlePost(request)
      default:
        this.logger.debug(`Unsupported method: ${request.method}`)
        return new HttpResponse(request.version, 400, request.route)
    }
  }

  private async handleGet(request: HttpRequest): Promise<HttpResponse> {
    const safety = await checkPathSafety(this.fs, this.root, request.route)
    if (safety.kind === 'unsafe') {
      this.logger.warn(`Blocked access outside root: ${safety.path}`)
      return this.plainText(request, 403, safety.path, 'Forbidden')
    }
    if (safety.kind === 'error') {
      this.logger.warn(`Could not resolve ${safety.path}: ${errorMessage(safety.cause)}`)
      return this.plainText(request, 404, safety.path, 'File not found')
    }

    // Missing or unstattable paths are answered as not found below.
    const stat: IFileStat | null = await this.fs.stat(safety.path).catch((err: unknown) => {
      this.logger.debug(`stat failed for ${safety.path}: ${errorMessage(err)}`)
      return null
    })

    if (stat?.isDirectory) {
      return this.serveDirectory(request, safety.path)
    }
    if (stat?.isFile) {
      return this.serveFile(request, safety.path)
    }
    return this.plainText(request, 404, safety.path, 'File not found')
  }

  private async serveDirectory(request: HttpRequest, dirPath: string): Promise<HttpResponse> {
    const listing = await generateDirectoryListing(
      this.fs,
      dirPath,
      decodeRequestPath(request.route),
      { exposeErrorDetails: this.exposeErrorDetails },
    )
    const response = new HttpResponse(request.version, listing.status, dirPath)
    response.addHeader('Content-Type', 'text/html')
    response.setBody(listing.html)
    return response
  }

  private async serveFile(request: HttpRequest, filePath: string): Promise<HttpResponse> {
    let data: Uint8Array
    try {
      data = await this.fs.readFile(filePath)
    } catch (err) {
      const detail = this.exposeErrorDetails ? `: ${errorMessage(err)}` : ''
      switch (classifyFileSystemError(err)) {
        case 'permission-denied':
          return this.plainText(request, 403, filePath, `Access denied${detail}`)
        case 'not-found':
          return this.plainText(request, 404, filePath, 'File not found')
        default:
          this.logger.error(`Error reading ${filePath}:`, err)
          return this.plainText(request, 500, filePath, `An error occurred${detail}`)
      }
    }

    const response = new HttpResponse(request.version, 200, filePath)
    response.addHeader('Content-Type', await this.classifier(data, filePath))
    response.setBody(data)
    return response
  }

  private handlePost(request: HttpRequest): HttpResponse {
    const response = new HttpResponse(request.version, 200, request.route)
    response.addHeader('Content-Type', 'text/html')
    response.setBody(
      `<html><body><h1>Received POST request</h1><p>Body: ${escapeHtml(request.body)}</p></body></html>`,
    )
    return response
  }

  private plainText(
    request: HttpRequest,
    status: StatusCode,
    diagnosticPath: string,
    message: string,
  ): HttpResponse {
    const response = new HttpResponse(request.version, status, diagnosticPath)
    response.addHeader('Content-Type', 'text/plain')
    response.setBody(message)
    return response
  }
}
