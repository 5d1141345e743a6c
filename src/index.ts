#!/usr/bin/env node
import { exitOnInterrupt, runCLI } from "./cli";

exitOnInterrupt(process);

runCLI(process.argv.slice(2), {
  env: process.env,
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("❌ Unexpected failure:", error);
    process.exit(1);
  });
