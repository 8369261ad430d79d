#!/usr/bin/env node
/**
 * sdkpath CLI - .NET SDK PATH auditor
 *
 * Checks that the 64-bit .NET SDK is reachable through PATH ahead of the
 * 32-bit one, once per shell session or on every recompilation.
 */

import { Command } from "commander";
import { SDKPATH_VERSION } from "@sdkpath/core";
import { checkCommand } from "./commands/check.js";
import { watchCommand } from "./commands/watch.js";
import { sessionCommand } from "./commands/session.js";
import { reportCommand } from "./commands/report.js";

const program = new Command();

program
  .name("sdkpath")
  .description("Audit the PATH for the 64-bit and 32-bit .NET SDK installs")
  .version(SDKPATH_VERSION)
  .option("--debug", "Record debug-level trace entries");

// Register commands
program.addCommand(checkCommand);
program.addCommand(watchCommand);
program.addCommand(sessionCommand);
program.addCommand(reportCommand);

await program.parseAsync();
