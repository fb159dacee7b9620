#!/usr/bin/env node
import { getLogger } from "../logger";
import { runCli } from "./program";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err) => {
  getLogger().fatal("Unexpected failure", { error: err });
  process.exitCode = 1;
});
