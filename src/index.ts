#!/usr/bin/env node
import "dotenv/config";
import { parseCliArgs, USAGE } from "./cli/args.js";
import { EXIT_USAGE, runCommand } from "./cli/commands.js";

const parsed = parseCliArgs(process.argv.slice(2));

if (!parsed.ok) {
  console.error(parsed.error);
  console.error(USAGE);
  process.exitCode = EXIT_USAGE;
} else {
  process.exitCode = await runCommand(parsed.args, { now: new Date() });
}
