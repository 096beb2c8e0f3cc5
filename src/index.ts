#!/usr/bin/env node
import "dotenv/config";
import chalk from "chalk";
import { buildProgram } from "./cli/commands.js";
import { BacktideError } from "./errors.js";

const program = buildProgram();
program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof BacktideError) {
    console.error(chalk.red(err.message));
    process.exit(err.exitCode);
  }
  console.error(chalk.red(String(err)));
  process.exit(1);
});
