/**
 * Entry point: runs the CLI against the current directory.
 */

import { runCli } from "./cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), {
    workspaceRoot: process.cwd(),
    io: {
      out: (text) => process.stdout.write(text),
      err: (text) => process.stderr.write(text),
    },
  });
}

main().catch((err: unknown) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 2;
});
