import { venvBinary } from "../layout.js";
import type { ProjectSpec } from "../types.js";

export interface EditorSettings {
  [key: string]: string | boolean;
}

export function buildEditorSettings(spec: ProjectSpec): EditorSettings {
  const interpreter = venvBinary(spec, "python");
  return {
    "python.pythonPath": interpreter,
    "python.defaultInterpreterPath": interpreter,
    "python.linting.enabled": true,
    "python.linting.pylintEnabled": true,
    "python.formatting.provider": "autopep8",
    "python.testing.pytestEnabled": true,
    "python.testing.unittestEnabled": false,
    "python.autoComplete.addBrackets": true,
    "python.jediEnabled": false
  };
}

export function renderEditorSettings(spec: ProjectSpec): string {
  return `${JSON.stringify(buildEditorSettings(spec), null, 4)}\n`;
}
