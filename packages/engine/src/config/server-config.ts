export interface ServerConfig {
  /** Port to listen on. Default: 5500 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Root directory to serve. */
  root: string;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** Max time allowed for receiving a full HTTP request. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max size of the request line plus headers. Default: 8KB */
  maxHeaderSize: number;
  /** Max size of a whole request, head and body. Default: 1MB */
  maxRequestSize: number;
  /**
   * Append the underlying OS error text to 403/500 bodies. Default: false,
   * since that text carries absolute filesystem paths.
   */
  exposeErrorDetails: boolean;
}

export function defaultConfig(root: string): ServerConfig {
  return {
    port: 5500,
    host: "127.0.0.1",
    root,
    quiet: false,
    requestTimeoutMs: 5000,
    maxHeaderSize: 8 * 1024,
    maxRequestSize: 1024 * 1024,
    exposeErrorDetails: false,
  };
}
