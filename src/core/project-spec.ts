import { existsSync, statSync } from "node:fs";
import { resolve } from "node:path";

import { z } from "zod";

import { UserInputError } from "./errors.js";
import type { CreateCommandOptions, ProjectSpec } from "./types.js";

export const DEFAULT_DIRECTORY = "project";
export const DEFAULT_VENV_NAME = "venv";
export const DEFAULT_PYTHON_VERSION = "3.11.3";

const MIN_COMMAND_TIMEOUT_SEC = 1;
// setTimeout cannot wait longer than 2^31-1 ms.
const MAX_COMMAND_TIMEOUT_SEC = 86_400;

const nonBlank = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : fallback;
    });

const projectSpecSchema = z.object({
  dir: nonBlank(DEFAULT_DIRECTORY),
  venv: nonBlank(DEFAULT_VENV_NAME),
  python: nonBlank(DEFAULT_PYTHON_VERSION),
  packages: z
    .string()
    .optional()
    .transform((value) => splitPackageList(value ?? "")),
  envFrom: z
    .string()
    .optional()
    .transform((value) => {
      const trimmed = value?.trim();
      return trimmed ? trimmed : undefined;
    })
});

/**
 * Splits the comma-separated `--packages` value. Names are not validated, only trimmed;
 * empty segments are dropped and repeats are kept in order.
 */
export function splitPackageList(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parseProjectSpec(options: CreateCommandOptions, cwd: string = process.cwd()): ProjectSpec {
  const parsed = projectSpecSchema.safeParse(options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UserInputError(`Invalid option ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown"}`);
  }

  const { dir, venv, python, packages, envFrom } = parsed.data;
  let envSource: string | undefined;
  if (envFrom !== undefined) {
    envSource = resolve(cwd, envFrom);
    if (!existsSync(envSource)) {
      throw new UserInputError(`Environment file not found: ${envFrom}`);
    }
    if (!statSync(envSource).isFile()) {
      throw new UserInputError(`Environment file is not a regular file: ${envFrom}`);
    }
  }

  return Object.freeze({
    directory: dir,
    venvName: venv,
    pythonVersion: python,
    packages: Object.freeze(packages),
    ...(envSource !== undefined ? { envSource } : {})
  });
}

export function parseCommandTimeout(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const seconds = Number(value.trim());
  if (!Number.isFinite(seconds) || seconds < MIN_COMMAND_TIMEOUT_SEC || seconds > MAX_COMMAND_TIMEOUT_SEC) {
    throw new UserInputError(
      `Invalid --command-timeout value "${value}". Expected a number of seconds between ${MIN_COMMAND_TIMEOUT_SEC} and ${MAX_COMMAND_TIMEOUT_SEC}.`
    );
  }
  return Math.round(seconds * 1000);
}
