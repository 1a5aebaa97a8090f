import type { ServerConfig } from "../config/server-config.js";
import {
  HttpRequestParseError,
  HttpRequestStreamParser,
} from "../http/request-parser.js";
import { HttpResponse } from "../http/response.js";
import { sendResponse } from "../http/response-writer.js";
import type { HttpRequest, StatusCode } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import type { ContentTypeClassifier } from "./content-type.js";
import { invalidRequestResponse, RequestHandler } from "./request-handler.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  classifier?: ContentTypeClassifier;
}

export type WebServerEvents = {
  listening: [port: number];
  error: [err: Error];
  close: [];
};

/**
 * Accepts connections and serves one request on each. Every connection runs
 * as its own async task, so a slow peer only holds up itself.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private tcpServer: ITcpServer | null = null;
  private handler: RequestHandler;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = options.config;
    this.logger = options.logger ?? basicLogger();

    this.handler = new RequestHandler({
      root: this.config.root,
      fs: options.fileSystem,
      classifier: options.classifier,
      exposeErrorDetails: this.config.exposeErrorDetails,
      logger: this.logger,
    });
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected connection:", err);
          return;
        }
        this.handleConnection(socket).catch((err: unknown) => {
          this.logger.error("Connection handler failed:", err);
        });
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(err);
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      // Close all active connections
      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError((err) => {
      this.logger.error("Socket error:", err);
      this.activeConnections.delete(socket);
    });

    const parser = new HttpRequestStreamParser(socket);

    try {
      let request: HttpRequest;
      try {
        request = await parser.readRequest({
          timeoutMs: this.config.requestTimeoutMs,
          maxHeaderSize: this.config.maxHeaderSize,
          maxRequestSize: this.config.maxRequestSize,
        });
      } catch (err) {
        const outcome = classifyRequestParseFailure(err);
        if (outcome === "close") {
          return;
        }
        this.logger.debug(`Failed to parse request: ${describeError(err)}`);
        await sendResponse(socket, errorResponse(outcome));
        return;
      }

      if (!this.config.quiet) {
        const addr = socket.remoteAddress ?? "?";
        this.logger.info(`${request.method} /${request.route} - ${addr}`);
      }

      let response: HttpResponse;
      try {
        response = await this.handler.handle(request);
      } catch (err) {
        this.logger.error("Error serving request:", err);
        response = new HttpResponse(request.version, 500, request.route);
        response.addHeader("Content-Type", "text/plain");
        response.setBody("Internal Server Error");
      }

      this.logger.debug(response.describe());
      await sendResponse(socket, response);
    } catch (err) {
      this.logger.error("Error writing response:", err);
    } finally {
      // Close the socket once the single exchange is done.
      socket.close();
    }
  }
}

function errorResponse(status: StatusCode): HttpResponse {
  if (status === 400) {
    return invalidRequestResponse();
  }
  return new HttpResponse("HTTP/1.1", status, "Invalid Request");
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function classifyRequestParseFailure(
  err: unknown,
): 400 | 408 | 413 | 431 | "close" {
  if (!(err instanceof HttpRequestParseError)) {
    // Socket-level failure; there is no peer left to answer.
    return "close";
  }

  switch (err.code) {
    case "IDLE_TIMEOUT":
    case "CONNECTION_CLOSED":
      return "close";
    case "REQUEST_TIMEOUT":
      return 408;
    case "REQUEST_TOO_LARGE":
      return 413;
    case "HEADERS_TOO_LARGE":
      return 431;
    default:
      return 400;
  }
}
