#!/usr/bin/env node
import { runVboxBuild } from "../commands/vbox-build";

async function main(): Promise<void> {
  const exitCode = await runVboxBuild(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
