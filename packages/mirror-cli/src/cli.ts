#!/usr/bin/env -S node --import tsx
import { loggerFactory } from "@helpmirror/catalog-sdk";
import { runCli } from "./program.js";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
  await loggerFactory.flush();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
