import { relative } from "node:path";

import { createConsoleLogger, type Logger } from "../core/logger.js";
import { DEFAULT_FAILURE_POLICY, STRICT_FAILURE_POLICY } from "../core/policy.js";
import { createCommandRunner } from "../core/process-runner.js";
import { parseCommandTimeout, parseProjectSpec } from "../core/project-spec.js";
import { runPipeline, type PipelineReport } from "../core/sequencer.js";
import type { CommandRunner, CreateCommandOptions } from "../core/types.js";

export interface CreateCommandDeps {
  cwd?: string;
  logger?: Logger;
  runner?: CommandRunner;
}

function toDisplayPath(cwd: string, path: string): string {
  const rel = relative(cwd, path);
  if (!rel || rel === "") return ".";
  return rel.startsWith("..") ? path : rel;
}

export async function runCreate(options: CreateCommandOptions, deps: CreateCommandDeps = {}): Promise<PipelineReport> {
  const cwd = deps.cwd ?? process.cwd();
  const logger = deps.logger ?? createConsoleLogger();
  const spec = parseProjectSpec(options, cwd);
  const timeoutMs = parseCommandTimeout(options.commandTimeout);
  const runner = deps.runner ?? createCommandRunner({ timeoutMs });

  const report = await runPipeline(spec, {
    cwd,
    logger,
    runner,
    policy: options.strict ? STRICT_FAILURE_POLICY : DEFAULT_FAILURE_POLICY,
    initializeGit: options.git ?? true,
    listTree: options.tree ?? true
  });

  logger.success(`Project created at \`${toDisplayPath(cwd, report.rootDir)}\`.`);
  logger.info(
    `Installed ${report.installedPackages.length} of ${report.installedPackages.length + report.failedPackages.length} packages.`
  );
  if (report.warnings.length > 0) {
    logger.warn(`Completed with ${report.warnings.length} warning(s); inspect the scaffold before use.`);
  }
  return report;
}
