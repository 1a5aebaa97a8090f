import { concat, fromString } from "../utils/buffer.js";
import type { HttpVersion, StatusCode } from "./types.js";
import { STATUS_TEXT } from "./types.js";

/**
 * A response under construction. Header names are stored lowercase and
 * `accept-ranges: bytes` is always present.
 */
export class HttpResponse {
  readonly headers = new Map<string, string>();
  /** Resolved path the response was built from; diagnostics only. */
  readonly path: string;
  private _body: Uint8Array = new Uint8Array(0);

  constructor(
    readonly version: HttpVersion,
    public status: StatusCode,
    path: string,
  ) {
    this.path = path.replace(/^\/+/, "");
    this.addHeader("Accept-Ranges", "bytes");
  }

  get body(): Uint8Array {
    return this._body;
  }

  get reason(): string {
    return STATUS_TEXT[this.status];
  }

  addHeader(name: string, value: string): void {
    this.headers.set(name.toLowerCase(), value);
  }

  /** Replace the body and set `content-length` to its byte length. */
  setBody(body: Uint8Array | string): void {
    this._body = typeof body === "string" ? fromString(body) : body;
    this.addHeader("Content-Length", String(this._body.length));
  }

  serialize(): Uint8Array {
    const lines: string[] = [`${this.version} ${this.status} ${this.reason}`];
    for (const [key, value] of this.headers) {
      lines.push(`${key}: ${value}`);
    }
    lines.push("", ""); // \r\n\r\n
    return concat([fromString(lines.join("\r\n")), this._body]);
  }

  describe(): string {
    const contentLength = this.headers.get("content-length") ?? "0";
    const acceptRanges = this.headers.get("accept-ranges") ?? "none";
    return `${this.version} ${this.status} ${this.reason} content-length=${contentLength} accept-ranges=${acceptRanges} body=<${this._body.length} bytes> path=${JSON.stringify(this.path)}`;
  }
}
