import { APP_DIR, LOCK_FILE, SCRATCH_DIR, WORKSPACE_DIR, projectName } from "../layout.js";
import { normalizeMarkdown } from "../text.js";
import type { ProjectSpec } from "../types.js";

export const CONTAINER_PORT = 8000;

export function buildDockerfile(spec: ProjectSpec): string {
  return normalizeMarkdown(`FROM python:${spec.pythonVersion}
WORKDIR /app
COPY ${LOCK_FILE} .
RUN pip install -r ${LOCK_FILE}
COPY . .
CMD ["tail", "-f", "/dev/null"]
`);
}

// The compose file lives in config/, so host paths are relative to it.
export function buildComposeFile(spec: ProjectSpec): string {
  return normalizeMarkdown(`version: '3.9'
services:
  ${projectName(spec)}:
    build: ./
    volumes:
      - ../${APP_DIR}:/app
      - .:/config/
      - ../${WORKSPACE_DIR}:/workspace
      - ./${SCRATCH_DIR}:/rontesting
    ports:
      - "${CONTAINER_PORT}:${CONTAINER_PORT}"
`);
}
