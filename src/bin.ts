#!/usr/bin/env node
import { buildProgram } from "./cli.js";
import { errorMessage } from "./errors.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    process.stderr.write(`memweave: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  });
