#!/usr/bin/env node
import "dotenv/config";

import { runCli } from "./cli.js";

console.log("Feed Digest");
console.log("===========\n");

runCli(process.env)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
