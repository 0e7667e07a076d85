#!/usr/bin/env -S tsx

import { runDustOpacityCli } from "../tools/dust-opacity-cli";

async function main() {
  process.exitCode = await runDustOpacityCli(process.argv.slice(2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
