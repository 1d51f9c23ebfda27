import { DATABASE_FILE, ENV_FILE, SCRATCH_DIR } from "../layout.js";
import { joinLines } from "../text.js";
import type { ProjectSpec } from "../types.js";

const PYTHON_IGNORE_PATTERNS = [
  "__pycache__/",
  "*.pyc",
  "*.pyo",
  "*.pyd",
  ".Python",
  ".ipynb_checkpoints/",
  ".vscode/",
  ".idea/",
  "*.log",
  ".DS_Store",
  "dist/",
  "build/",
  "*.egg-info/",
  ".pytest_cache/",
  ".mypy_cache/"
];

// Written to config/, so generated entries are relative to that directory.
export function buildGitignore(spec: ProjectSpec): string {
  return joinLines([`${spec.venvName}/`, DATABASE_FILE, `${SCRATCH_DIR}/`, ENV_FILE, ...PYTHON_IGNORE_PATTERNS]);
}

export function buildDockerignore(spec: ProjectSpec): string {
  return joinLines([
    ".git",
    ".vscode",
    "*.pyc",
    "*.pyo",
    "*.pyd",
    "__pycache__",
    ".Python",
    `${spec.venvName}/`,
    ENV_FILE,
    DATABASE_FILE,
    "pip-log.txt",
    "pip-delete-this-directory.txt"
  ]);
}
