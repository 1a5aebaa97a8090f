import * as path from "node:path";
import {
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type Logger,
  type NodeServerOptions,
  prefixedLogger,
  type WebServer,
} from "@dirhost/engine";
import { parseArgs } from "./args.js";

/** Process-level effects of the CLI, swappable for tests. */
export interface CliRuntime {
  createServer(options: NodeServerOptions): WebServer;
  logger: Logger;
  print(line: string): void;
  onSignal(signal: "SIGINT" | "SIGTERM", handler: () => void): void;
  exit(code: number): void;
}

export const nodeRuntime: CliRuntime = {
  createServer: createNodeServer,
  logger: prefixedLogger("dirhost", filteredLogger("info")),
  print: (line) => console.log(line),
  onSignal: (signal, handler) => {
    process.on(signal, handler);
  },
  exit: (code) => process.exit(code),
};

/**
 * Start serving the directory named in `argv` and install the shutdown
 * handlers. Rejects on bad arguments or when the server cannot bind.
 */
export async function runCli(
  argv: string[],
  runtime: CliRuntime = nodeRuntime,
): Promise<WebServer> {
  const args = parseArgs(argv);
  const root = path.resolve(args.root);
  const { logger } = runtime;

  const config = defaultConfig(root);
  const server = runtime.createServer({ config, logger });

  server.on("error", (err) => {
    logger.error("Server error:", err);
  });

  const port = await server.start();

  runtime.print(`\n  dirhost serving ${root}\n`);
  runtime.print(`  Local:   http://${config.host}:${port}\n`);

  const shutdown = async () => {
    runtime.print("\nShutting down...");
    await server.stop();
    runtime.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error("Shutdown failed:", err);
      runtime.exit(1);
    });
  };

  runtime.onSignal("SIGINT", onSignal);
  runtime.onSignal("SIGTERM", onSignal);

  return server;
}
