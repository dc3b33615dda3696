#!/usr/bin/env node
/**
 * checkstate CLI
 *
 * Checks the local copies of a set of repositories and compares them
 * with what the other machines last recorded in the shared repository.
 */

import { program } from "commander";

import { check } from "./commands/index.js";
import { VERSION } from "./version.js";

program
  .name("checkstate")
  .description("Compare the state of git folders across machines")
  .version(VERSION)
  .argument("[set]", "Set to check (guessed from the current folder if omitted)")
  .argument("[instance]", "Instance (machine) of the set (guessed if omitted)")
  .option("--repo <locator>", "Repository holding the settings and results documents")
  .option("--no-store", "Do not store the results in the repository")
  .option("-l, --list", "List known sets and instances")
  .option("--show-stored", "Show stored results without checking this machine")
  .option("--json", "Output the report as JSON")
  .option("-v, --verbose", "Print debug output")
  .action(check);

// Parse and run
await program.parseAsync();
