import "dotenv/config";
import { runCli } from "./cli";
import { ShutdownToken, fatal } from "./lib/closing";
import { loadConfig } from "./lib/config";

const shutdown = new ShutdownToken();

async function main(): Promise<void> {
  const config = loadConfig();
  process.exitCode = await runCli(process.argv.slice(2), config, shutdown);
}

main().catch((error: unknown) => {
  fatal(shutdown, error instanceof Error ? error.stack || error.message : String(error));
  process.exitCode = 1;
});
