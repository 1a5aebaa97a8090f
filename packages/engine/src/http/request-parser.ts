import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, findSequence } from "../utils/buffer.js";
import type { HttpRequest } from "./types.js";
import { parseMethod, parseVersion } from "./types.js";

const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_REQUEST_SIZE = 1024 * 1024; // 1MB
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

export interface ReadHttpRequestOptions {
  /** Max bytes before the blank line that ends the header block. */
  maxHeaderSize?: number;
  /** Max bytes for head and body together. */
  maxRequestSize?: number;
  /** Time allowed for the whole request to arrive. */
  timeoutMs?: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "HEADERS_TOO_LARGE"
  | "REQUEST_TOO_LARGE"
  | "INVALID_CONTENT_LENGTH"
  | "MALFORMED_REQUEST_LINE"
  | "UNKNOWN_METHOD"
  | "UNSUPPORTED_VERSION"
  | "MALFORMED_HEADER";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

/**
 * Parse a complete raw request.
 *
 * The request line must hold exactly a method, a target and a version.
 * Header lines run from the first CRLF to the first empty line and must
 * each contain a colon; the body is everything after the first CRLF CRLF.
 */
export function parseHttpRequest(raw: string): HttpRequest {
  const newline = raw.indexOf("\n");
  const requestLine = (newline === -1 ? raw : raw.slice(0, newline)).replace(
    /\r$/,
    "",
  );
  const parts = requestLine.split(/\s+/).filter((part) => part !== "");
  if (parts.length !== 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Malformed request line",
    );
  }

  const [methodToken, target, versionToken] = parts;
  const method = parseMethod(methodToken);
  if (!method) {
    throw new HttpRequestParseError(
      "UNKNOWN_METHOD",
      `Unknown method: ${methodToken}`,
    );
  }

  const version = parseVersion(versionToken);
  if (!version) {
    throw new HttpRequestParseError(
      "UNSUPPORTED_VERSION",
      `Unsupported version: ${versionToken}`,
    );
  }

  const headers = parseHeaders(raw);

  const separatorIndex = raw.indexOf("\r\n\r\n");
  const body = separatorIndex === -1 ? "" : raw.slice(separatorIndex + 4);

  return {
    method,
    route: target.startsWith("/") ? target.slice(1) : target,
    version,
    headers,
    body,
  };
}

/** Like {@link parseHttpRequest}, but returns null for malformed input. */
export function tryParseHttpRequest(raw: string): HttpRequest | null {
  try {
    return parseHttpRequest(raw);
  } catch (err) {
    if (err instanceof HttpRequestParseError) {
      return null;
    }
    throw err;
  }
}

function parseHeaders(raw: string): Map<string, string> {
  const lineEnd = raw.indexOf("\r\n");
  if (lineEnd === -1) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      "Request line is not CRLF-terminated",
    );
  }

  const headers = new Map<string, string>();
  for (const line of raw.slice(lineEnd + 2).split("\r\n")) {
    if (line === "") break;
    const colonIdx = line.indexOf(":");
    if (colonIdx === -1) {
      throw new HttpRequestParseError(
        "MALFORMED_HEADER",
        `Malformed header line: ${line}`,
      );
    }
    headers.set(
      line.substring(0, colonIdx).trim(),
      line.substring(colonIdx + 1).trim(),
    );
  }
  return headers;
}

function readContentLength(head: string): number | null {
  let contentLength: number | null = null;
  const lines = head.split("\r\n");
  for (let i = 1; i < lines.length; i++) {
    const colonIdx = lines[i].indexOf(":");
    if (colonIdx === -1) continue;
    const key = lines[i].substring(0, colonIdx).trim().toLowerCase();
    if (key !== "content-length") continue;
    const value = lines[i].substring(colonIdx + 1).trim();
    if (!/^\d+$/.test(value)) {
      throw new HttpRequestParseError(
        "INVALID_CONTENT_LENGTH",
        "Invalid Content-Length",
      );
    }
    contentLength = Number.parseInt(value, 10);
  }
  return contentLength;
}

/**
 * Returns the byte length of the first complete request in the buffer, or
 * null while more data is needed. Without a Content-Length the request runs
 * to the end of whatever has arrived.
 */
function completeRequestLength(
  buffer: Uint8Array,
  maxHeaderSize: number,
  maxRequestSize: number,
): number | null {
  const separatorIndex = findSequence(buffer, CRLF_CRLF);
  if (separatorIndex === -1) {
    if (buffer.length > maxHeaderSize) {
      throw new HttpRequestParseError(
        "HEADERS_TOO_LARGE",
        "Request headers too large",
      );
    }
    return null;
  }

  if (separatorIndex > maxHeaderSize) {
    throw new HttpRequestParseError(
      "HEADERS_TOO_LARGE",
      "Request headers too large",
    );
  }

  const head = decodeToString(buffer.subarray(0, separatorIndex));
  const contentLength = readContentLength(head);
  const total =
    contentLength === null
      ? buffer.length
      : separatorIndex + CRLF_CRLF.length + contentLength;
  if (total > maxRequestSize) {
    throw new HttpRequestParseError(
      "REQUEST_TOO_LARGE",
      "Request too large",
    );
  }

  return buffer.length >= total ? total : null;
}

/**
 * Collects socket data into a growable buffer until one request is complete,
 * then parses it. Growth is bounded by the header and request size limits.
 */
export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  async readRequest(options?: ReadHttpRequestOptions): Promise<HttpRequest> {
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
    const maxRequestSize = options?.maxRequestSize ?? DEFAULT_MAX_REQUEST_SIZE;
    const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (true) {
      const length = completeRequestLength(
        this.buffer,
        maxHeaderSize,
        maxRequestSize,
      );
      if (length !== null) {
        return this.take(length);
      }

      if (this.socketError) {
        throw this.socketError;
      }

      if (this.closed) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "CONNECTION_CLOSED",
            "Connection closed",
          );
        }
        // Peer finished sending without a complete frame; parse what arrived.
        return this.take(this.buffer.length);
      }

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (this.buffer.length === 0) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }
  }

  private take(length: number): HttpRequest {
    const raw = decodeToString(this.buffer.subarray(0, length));
    this.buffer = this.buffer.slice(length);
    return parseHttpRequest(raw);
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

/**
 * Read and parse a single request from a TCP socket stream.
 */
export function readHttpRequest(
  socket: ITcpSocket,
  options?: ReadHttpRequestOptions,
): Promise<HttpRequest> {
  return new HttpRequestStreamParser(socket).readRequest(options);
}
