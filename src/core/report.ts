import { CONFIG_DIR, venvPath } from "./layout.js";
import { DEFAULT_PYTHON_VERSION } from "./project-spec.js";
import { banner } from "./text.js";
import type { ProjectSpec } from "./types.js";

export function renderActivationCommand(spec: ProjectSpec): string {
  return `source ${spec.directory}/${venvPath(spec)}/bin/activate && cd ${spec.directory}/${CONFIG_DIR}/ && docker-compose up -d`;
}

export function renderActivationHint(spec: ProjectSpec): string {
  return banner(["To activate the virtual environment, run:", renderActivationCommand(spec)]).join("\n");
}

export function renderExampleUsage(): string {
  return banner([
    `Example usage: pyseed --dir my_cool_project --venv my_env --packages numpy,pandas,matplotlib --python ${DEFAULT_PYTHON_VERSION}`
  ]).join("\n");
}
