import { CliUsageError, USAGE } from "./args.js";
import { runCli } from "./run.js";

runCli(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    console.error(USAGE);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
