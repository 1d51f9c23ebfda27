import { projectName, venvPath } from "../layout.js";
import { DEFAULT_DIRECTORY, DEFAULT_PYTHON_VERSION, DEFAULT_VENV_NAME } from "../project-spec.js";
import { renderActivationCommand } from "../report.js";
import { normalizeMarkdown } from "../text.js";
import type { ProjectSpec } from "../types.js";

export function buildReadme(spec: ProjectSpec): string {
  const name = projectName(spec);
  return normalizeMarkdown(`# ${name}

This project uses Python version ${spec.pythonVersion}.

## Introduction
The project was scaffolded with a dedicated virtual environment, a SQLite database and a Docker environment.
The generator accepts these options:
- \`--dir\`: directory name for the new project. Default is '${DEFAULT_DIRECTORY}'.
- \`--venv\`: name of the virtual environment to create. Default is '${DEFAULT_VENV_NAME}'.
- \`--packages\`: comma-separated list of packages to install into the virtual environment. Default is none.
- \`--python\`: Python version used for the virtual environment. Default is '${DEFAULT_PYTHON_VERSION}'.

## Example Usage
\`\`\`
pyseed --dir my_cool_project --venv my_env --packages numpy,pandas,matplotlib --python ${DEFAULT_PYTHON_VERSION}
\`\`\`

## Docker Commands
Run these from the \`config/\` directory.
- Build the image: \`docker-compose build\`
- Start the containers: \`docker-compose up -d\`
- Stop the containers: \`docker-compose down\`
- List containers: \`docker ps -a\`
- Run a command inside a container: \`docker exec -it <container-id> <command>\`

For example, to run the starter script inside the container:
\`\`\`
docker exec -it <container-id> python /app/openai_script.py
\`\`\`

## Project Structure
\`\`\`
${name}/
├── app/
│   └── openai_script.py
├── config/
│   ├── .env
│   ├── .gitignore
│   ├── .vscode/
│   ├── Dockerfile
│   ├── README.md
│   ├── RONTESTING/
│   ├── database.sqlite3
│   ├── docker-compose.yml
│   ├── requirements.txt
│   ├── tests/
│   └── ${spec.venvName}/
├── pytest.ini
└── WORKSPACE/
\`\`\`

## Activating the Virtual Environment
\`\`\`
${renderActivationCommand(spec)}
\`\`\`
The interpreter lives in \`${venvPath(spec)}/bin/python\`.
`);
}
