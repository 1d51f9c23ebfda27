import { join, resolve } from "node:path";

import {
  buildFreezeInvocation,
  buildGitInvocations,
  buildInstallInvocation,
  buildTreeInvocation,
  buildVirtualenvInvocation,
  resolveInstallList
} from "./invocations.js";
import { DATABASE_FILE, LAYOUT_PLAN, configPath, venvPath } from "./layout.js";
import type { Logger } from "./logger.js";
import { DEFAULT_FAILURE_POLICY, handleCommandFailure, type FailurePolicy, type StepWarning } from "./policy.js";
import { renderActivationHint, renderExampleUsage } from "./report.js";
import { ENV_FILE_PATH, renderTemplateSet } from "./templates.js";
import type { CommandRunner, ProjectSpec } from "./types.js";
import { createDatabaseFile, createLayout, importEnvFile, prepareProjectRoot, writeArtifacts } from "./write.js";

export interface PipelineContext {
  cwd: string;
  logger: Logger;
  runner: CommandRunner;
  policy?: FailurePolicy;
  initializeGit?: boolean;
  listTree?: boolean;
}

export interface ProvisionResult {
  environmentCreated: boolean;
  installedPackages: string[];
  failedPackages: string[];
}

export interface PipelineReport extends ProvisionResult {
  rootDir: string;
  writtenFiles: string[];
  lockFileCaptured: boolean;
  repositoryInitialized: boolean;
  tree?: string;
  warnings: StepWarning[];
}

interface StepContext {
  logger: Logger;
  runner: CommandRunner;
  policy: FailurePolicy;
  warnings: StepWarning[];
}

export async function provisionEnvironment(spec: ProjectSpec, rootDir: string, context: StepContext): Promise<ProvisionResult> {
  context.logger.step(`Creating virtual environment ${venvPath(spec)} with Python version ${spec.pythonVersion}`);
  const venvInvocation = buildVirtualenvInvocation(spec, rootDir);
  const venvResult = await context.runner(venvInvocation);
  if (!venvResult.ok) {
    context.warnings.push(handleCommandFailure("virtualenv", venvInvocation, venvResult, context.policy, context.logger));
  }

  const installedPackages: string[] = [];
  const failedPackages: string[] = [];
  const packages = resolveInstallList(spec);
  for (const [index, pkg] of packages.entries()) {
    context.logger.info(`Installing ${index + 1}/${packages.length}: ${pkg}`);
    const invocation = buildInstallInvocation(spec, rootDir, pkg);
    const result = await context.runner(invocation);
    if (result.ok) {
      installedPackages.push(pkg);
      continue;
    }
    failedPackages.push(pkg);
    context.warnings.push(handleCommandFailure("install", invocation, result, context.policy, context.logger));
  }

  return { environmentCreated: venvResult.ok, installedPackages, failedPackages };
}

export async function writeProjectArtifacts(spec: ProjectSpec, rootDir: string, logger: Logger): Promise<string[]> {
  const files = renderTemplateSet(spec);
  const written: string[] = [];
  await writeArtifacts(rootDir, files, (file) => {
    written.push(file.path);
  });

  if (spec.envSource !== undefined) {
    await importEnvFile(spec.envSource, join(rootDir, ENV_FILE_PATH));
    logger.info(`Copied ${spec.envSource} to ${ENV_FILE_PATH}`);
  }

  const databasePath = configPath(DATABASE_FILE);
  await createDatabaseFile(join(rootDir, databasePath));
  written.push(databasePath);
  logger.info(`Created SQLite database ${databasePath}`);
  return written;
}

export async function captureLockFile(spec: ProjectSpec, rootDir: string, context: StepContext): Promise<boolean> {
  const invocation = buildFreezeInvocation(spec, rootDir);
  const result = await context.runner(invocation);
  if (!result.ok) {
    context.warnings.push(handleCommandFailure("freeze", invocation, result, context.policy, context.logger));
  }
  return result.ok;
}

/**
 * Runs init, branch, stage and commit in order. A failed sub-step is reported but the
 * remaining ones are still issued.
 */
export async function initializeRepository(rootDir: string, context: StepContext): Promise<boolean> {
  context.logger.step("Initializing Git repository");
  let allSucceeded = true;
  for (const invocation of buildGitInvocations(rootDir)) {
    const result = await context.runner(invocation);
    if (result.ok) continue;
    allSucceeded = false;
    context.warnings.push(handleCommandFailure("git", invocation, result, context.policy, context.logger));
  }
  return allSucceeded;
}

export async function listProjectTree(spec: ProjectSpec, rootDir: string, context: StepContext): Promise<string | undefined> {
  const invocation = buildTreeInvocation(spec, rootDir);
  const result = await context.runner(invocation);
  if (!result.ok) {
    context.warnings.push(handleCommandFailure("tree", invocation, result, context.policy, context.logger));
    return undefined;
  }
  return result.stdout.trimEnd();
}

export async function runPipeline(spec: ProjectSpec, context: PipelineContext): Promise<PipelineReport> {
  const { logger } = context;
  const rootDir = resolve(context.cwd, spec.directory);
  const stepContext: StepContext = {
    logger,
    runner: context.runner,
    policy: context.policy ?? DEFAULT_FAILURE_POLICY,
    warnings: []
  };

  logger.step(`Creating directory ${spec.directory}`);
  await prepareProjectRoot(rootDir);
  await createLayout(rootDir, LAYOUT_PLAN);

  const provision = await provisionEnvironment(spec, rootDir, stepContext);

  logger.step("Writing project files");
  const writtenFiles = await writeProjectArtifacts(spec, rootDir, logger);
  const lockFileCaptured = await captureLockFile(spec, rootDir, stepContext);

  const repositoryInitialized = context.initializeGit === false ? false : await initializeRepository(rootDir, stepContext);

  const tree = context.listTree === false ? undefined : await listProjectTree(spec, rootDir, stepContext);
  if (tree) {
    logger.message(tree);
  }
  logger.message(renderActivationHint(spec));
  logger.message(renderExampleUsage());

  return {
    rootDir,
    ...provision,
    writtenFiles,
    lockFileCaptured,
    repositoryInitialized,
    ...(tree !== undefined ? { tree } : {}),
    warnings: stepContext.warnings
  };
}
