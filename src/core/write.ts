import { existsSync } from "node:fs";
import { copyFile, mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import { DirectoryCreateError, DirectoryExistsError } from "./errors.js";
import type { FileArtifact } from "./types.js";

/**
 * Creates the project root. The root must not exist yet: running twice against the
 * same directory fails here, before anything is written.
 */
export async function prepareProjectRoot(rootDir: string): Promise<void> {
  if (existsSync(rootDir)) {
    throw new DirectoryExistsError(rootDir);
  }
  try {
    await mkdir(rootDir, { recursive: true });
  } catch (error) {
    throw new DirectoryCreateError(rootDir, error);
  }
}

export async function createLayout(rootDir: string, directories: readonly string[]): Promise<void> {
  for (const directory of directories) {
    await mkdir(join(rootDir, directory), { recursive: true });
  }
}

export async function writeArtifacts(
  rootDir: string,
  files: readonly FileArtifact[],
  onWrite?: (file: FileArtifact) => void
): Promise<void> {
  for (const file of files) {
    const absolutePath = join(rootDir, file.path);
    await mkdir(dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, file.content, "utf8");
    onWrite?.(file);
  }
}

// SQLite treats a zero-length file as an empty database.
export async function createDatabaseFile(path: string): Promise<void> {
  await writeFile(path, "");
}

export async function importEnvFile(source: string, destination: string): Promise<void> {
  await copyFile(source, destination);
}
