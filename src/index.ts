#!/usr/bin/env node

import "dotenv/config";
import { runCli } from "./cli.js";

async function main() {
  const exitCode = await runCli(process.argv.slice(2));
  // serve keeps the event loop alive through its listener
  process.exitCode = exitCode;
}

main().catch((err) => {
  console.error("pdfdex 실행 중 오류 발생:", err);
  process.exit(1);
});
