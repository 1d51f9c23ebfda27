import { posix } from "node:path";

import { APP_DIR, ENV_FILE, configPath } from "./layout.js";
import { buildComposeFile, buildDockerfile } from "./templates/container.js";
import { renderEditorSettings } from "./templates/editor.js";
import { buildEnvFile } from "./templates/environment.js";
import { buildReadme } from "./templates/documentation.js";
import { buildDockerignore, buildGitignore } from "./templates/ignore.js";
import { buildPytestIni, buildStarterScript, buildStarterTest } from "./templates/python.js";
import type { FileArtifact, ProjectSpec } from "./types.js";

export interface TemplateEntry {
  path: string;
  render: (spec: ProjectSpec) => string;
}

export const ENV_FILE_PATH = configPath(ENV_FILE);

/**
 * Every generated text file, keyed by its path under the project root.
 * Renderers are pure; the lock file and database are produced by the pipeline instead.
 */
export const TEMPLATE_SET: readonly TemplateEntry[] = [
  { path: ENV_FILE_PATH, render: () => buildEnvFile() },
  { path: configPath(".gitignore"), render: buildGitignore },
  { path: configPath(".vscode", "settings.json"), render: renderEditorSettings },
  { path: configPath("Dockerfile"), render: buildDockerfile },
  { path: configPath(".dockerignore"), render: buildDockerignore },
  { path: configPath("docker-compose.yml"), render: buildComposeFile },
  { path: configPath("README.md"), render: buildReadme },
  { path: configPath("tests", "test_initial.py"), render: () => buildStarterTest() },
  { path: posix.join(APP_DIR, "openai_script.py"), render: () => buildStarterScript() },
  { path: "pytest.ini", render: () => buildPytestIni() }
];

export function renderTemplateSet(spec: ProjectSpec, templates: readonly TemplateEntry[] = TEMPLATE_SET): FileArtifact[] {
  return templates.map((entry) => ({ path: entry.path, content: entry.render(spec) }));
}
