#!/usr/bin/env node
import { intro, log, outro } from "@clack/prompts";
import { Command } from "commander";

import { runCreate } from "./commands/create.js";
import { isCommanderSuccessExit, isReportedByCommander, normalizeError } from "./core/errors.js";
import { DEFAULT_DIRECTORY, DEFAULT_PYTHON_VERSION, DEFAULT_VENV_NAME } from "./core/project-spec.js";
import type { CreateCommandOptions } from "./core/types.js";
import packageJson from "../package.json" with { type: "json" };

const program = new Command();
const CLI_VERSION = packageJson.version;

program
  .name("pyseed")
  .description("Scaffold a local Python project with a virtual environment, Docker files and a git repository.")
  .version(CLI_VERSION)
  .option("--dir <name>", "Directory name", DEFAULT_DIRECTORY)
  .option("--venv <name>", "Virtual environment name", DEFAULT_VENV_NAME)
  .option("--packages <list>", "Packages to install (separated by commas)", "")
  .option("--python <version>", "Python version", DEFAULT_PYTHON_VERSION)
  .option("--env-from <file>", "Seed config/.env from an existing env file")
  .option("--no-git", "Skip git repository initialization")
  .option("--no-tree", "Skip the directory tree listing")
  .option("--strict", "Abort on the first failed external command", false)
  .option("--command-timeout <seconds>", "Timeout per external command in seconds (default: none)")
  .exitOverride()
  .action(async (rawOptions: CreateCommandOptions) => {
    intro(`pyseed v${CLI_VERSION}`);
    await runCreate(rawOptions);
    outro("Done.");
  });

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const normalized = normalizeError(error);
    if (isCommanderSuccessExit(normalized)) return;
    if (!isReportedByCommander(normalized)) {
      log.error(normalized.message);
    }
    process.exitCode = normalized.exitCode;
  }
}

void main();
