import { join } from "node:path";

import { LOCK_FILE, configPath, venvBinary, venvPath } from "./layout.js";
import type { ProcessInvocation, ProjectSpec } from "./types.js";

export const DEFAULT_PACKAGES: readonly string[] = ["python-dotenv", "pylint", "openai"];

export const INITIAL_BRANCH = "main";
export const INITIAL_COMMIT_MESSAGE = "Initial commit";

export function resolveInstallList(spec: ProjectSpec): string[] {
  return [...spec.packages, ...DEFAULT_PACKAGES];
}

export function buildVirtualenvInvocation(spec: ProjectSpec, rootDir: string): ProcessInvocation {
  return {
    command: "virtualenv",
    args: ["-p", `python${spec.pythonVersion}`, venvPath(spec)],
    cwd: rootDir,
    label: "Create virtual environment"
  };
}

export function buildInstallInvocation(spec: ProjectSpec, rootDir: string, pkg: string): ProcessInvocation {
  return {
    command: join(rootDir, venvBinary(spec, "pip")),
    args: ["install", pkg],
    cwd: rootDir,
    label: `Install ${pkg}`
  };
}

export function buildInstallInvocations(spec: ProjectSpec, rootDir: string): ProcessInvocation[] {
  return resolveInstallList(spec).map((pkg) => buildInstallInvocation(spec, rootDir, pkg));
}

export function buildFreezeInvocation(spec: ProjectSpec, rootDir: string): ProcessInvocation {
  return {
    command: join(rootDir, venvBinary(spec, "pip")),
    args: ["freeze"],
    cwd: rootDir,
    label: "Capture installed packages",
    stdoutFile: join(rootDir, configPath(LOCK_FILE))
  };
}

export function buildGitInvocations(rootDir: string): ProcessInvocation[] {
  return [
    { command: "git", args: ["init"], cwd: rootDir, label: "Initialize git repository" },
    { command: "git", args: ["checkout", "-b", INITIAL_BRANCH], cwd: rootDir, label: `Create ${INITIAL_BRANCH} branch` },
    { command: "git", args: ["add", "."], cwd: rootDir, label: "Stage files" },
    { command: "git", args: ["commit", "-m", INITIAL_COMMIT_MESSAGE], cwd: rootDir, label: "Create initial commit" }
  ];
}

export function buildTreeInvocation(spec: ProjectSpec, rootDir: string): ProcessInvocation {
  return {
    command: "tree",
    args: ["-I", `${spec.venvName}|.DS_Store`],
    cwd: rootDir,
    label: "List directory tree"
  };
}
