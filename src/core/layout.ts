import { posix } from "node:path";

import type { ProjectSpec } from "./types.js";

export const APP_DIR = "app";
export const CONFIG_DIR = "config";
export const WORKSPACE_DIR = "WORKSPACE";
export const SCRATCH_DIR = "RONTESTING";
export const DATABASE_FILE = "database.sqlite3";
export const LOCK_FILE = "requirements.txt";
export const ENV_FILE = ".env";

export const LAYOUT_PLAN: readonly string[] = Object.freeze([
  APP_DIR,
  CONFIG_DIR,
  WORKSPACE_DIR,
  posix.join(CONFIG_DIR, SCRATCH_DIR),
  posix.join(CONFIG_DIR, "tests")
]);

// Paths below are relative to the project root.

export function venvPath(spec: ProjectSpec): string {
  return posix.join(CONFIG_DIR, spec.venvName);
}

export function venvBinary(spec: ProjectSpec, name: string): string {
  return posix.join(venvPath(spec), "bin", name);
}

export function configPath(...parts: string[]): string {
  return posix.join(CONFIG_DIR, ...parts);
}

export function projectName(spec: ProjectSpec): string {
  return posix.basename(spec.directory.replaceAll("\\", "/"));
}
