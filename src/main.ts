import { runCli } from "./cli";
import { loadConfig } from "./config";
import { createLogger } from "./logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  process.exitCode = await runCli(process.argv.slice(2), {
    config,
    logger,
    io: {
      stdout: (line) => process.stdout.write(line + "\n"),
      stderr: (line) => process.stderr.write(line + "\n"),
    },
  });
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
