#!/usr/bin/env tsx

import { runCli } from "./cli";
import { consoleLogger } from "./log";
import { spawnInvoker } from "./runner";

runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  invoker: spawnInvoker,
  logger: consoleLogger,
  print: (text) => console.log(text),
})
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error(
      `buildgen: ${error instanceof Error ? error.message : String(error)}`
    );
    process.exit(1);
  });
