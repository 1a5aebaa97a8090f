// Node adapters
export {
  NodeFileSystem,
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./adapters/node/index.js";
// Config
export type { ServerConfig } from "./config/server-config.js";
export { defaultConfig } from "./config/server-config.js";
// HTTP
export type {
  HttpRequestParseErrorCode,
  ReadHttpRequestOptions,
} from "./http/request-parser.js";
export {
  HttpRequestParseError,
  HttpRequestStreamParser,
  parseHttpRequest,
  readHttpRequest,
  tryParseHttpRequest,
} from "./http/request-parser.js";
export { HttpResponse } from "./http/response.js";
export { sendResponse } from "./http/response-writer.js";
export type {
  HttpMethod,
  HttpRequest,
  HttpVersion,
  StatusCode,
} from "./http/types.js";
export { HTTP_METHODS, HTTP_VERSIONS, STATUS_TEXT } from "./http/types.js";
// Interfaces
export type {
  FileSystemErrorKind,
  IFileStat,
  IFileSystem,
} from "./interfaces/filesystem.js";
export { classifyFileSystemError } from "./interfaces/filesystem.js";
export type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "./interfaces/socket.js";
// Logging
export type { Logger, LogLevel } from "./logging/logger.js";
export {
  basicLogger,
  filteredLogger,
  prefixedLogger,
  silentLogger,
} from "./logging/logger.js";
// Presets
export type { NodeServerOptions } from "./presets/node.js";
export { createNodeServer } from "./presets/node.js";
// Server
export type { ContentTypeClassifier } from "./server/content-type.js";
export {
  extensionClassifier,
  sniffingClassifier,
} from "./server/content-type.js";
export type {
  DirectoryListing,
  DirectoryListingOptions,
} from "./server/directory-listing.js";
export { generateDirectoryListing } from "./server/directory-listing.js";
export type { PathSafety } from "./server/path-resolver.js";
export {
  checkPathSafety,
  decodeRequestPath,
  isWithinRoot,
} from "./server/path-resolver.js";
export type { RequestHandlerOptions } from "./server/request-handler.js";
export {
  invalidRequestResponse,
  RequestHandler,
} from "./server/request-handler.js";
export type { WebServerEvents, WebServerOptions } from "./server/web-server.js";
export { WebServer } from "./server/web-server.js";
// Testing
export { InMemoryFileSystem } from "./testing/in-memory-filesystem.js";
export {
  IN_MEMORY_EPHEMERAL_PORT,
  InMemorySocketFactory,
} from "./testing/in-memory-socket-factory.js";
// Utils
export { concat, decodeToString, fromString } from "./utils/buffer.js";
export { EventEmitter } from "./utils/event-emitter.js";
