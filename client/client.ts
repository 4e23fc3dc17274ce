#!/usr/bin/env node
import { run } from "./cli";

async function main() {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
