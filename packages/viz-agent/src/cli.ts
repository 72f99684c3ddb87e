#!/usr/bin/env node
import { errorMessage } from "@vizpilot/shared";
import { createProgram } from "./cli/program.js";

createProgram().parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exitCode = 1;
});
