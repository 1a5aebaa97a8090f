export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "DELETE",
  "HEAD",
  "OPTIONS",
  "TRACE",
  "CONNECT",
  "PATCH",
] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export const HTTP_VERSIONS = ["HTTP/1.1", "HTTP/2.0"] as const;

export type HttpVersion = (typeof HTTP_VERSIONS)[number];

export interface HttpRequest {
  readonly method: HttpMethod;
  /** Request target with its leading slash removed. */
  readonly route: string;
  readonly version: HttpVersion;
  /** Header names as received; values trimmed. */
  readonly headers: ReadonlyMap<string, string>;
  readonly body: string;
}

export type StatusCode = 200 | 400 | 403 | 404 | 408 | 413 | 431 | 500;

export const STATUS_TEXT: Record<StatusCode, string> = {
  200: "OK",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  408: "Request Timeout",
  413: "Content Too Large",
  431: "Request Header Fields Too Large",
  500: "Internal Server Error",
};

export function parseMethod(token: string): HttpMethod | null {
  const upper = token.toUpperCase();
  return HTTP_METHODS.find((method) => method === upper) ?? null;
}

export function parseVersion(token: string): HttpVersion | null {
  return HTTP_VERSIONS.find((version) => version === token) ?? null;
}
