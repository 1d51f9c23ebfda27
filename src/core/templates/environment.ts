import { joinLines } from "../text.js";

interface EnvGroup {
  provider: string;
  entries: ReadonlyArray<readonly [key: string, value: string]>;
}

const ENV_GROUPS: readonly EnvGroup[] = [
  { provider: "openai", entries: [["OPENAI_API_KEY", ""]] },
  {
    provider: "aws",
    entries: [
      ["S3_BUCKET", ""],
      ["AWS_ACCESS_KEY_ID", ""],
      ["AWS_SECRET_ACCESS_KEY", ""],
      ["AWS_REGION", ""]
    ]
  },
  { provider: "django", entries: [["DJANGO_SECRET_KEY", ""]] },
  {
    provider: "pinecone",
    entries: [
      ["DATASTORE", "pinecone"],
      ["PINECONE_API_KEY", ""],
      ["PINECONE_ENVIRONMENT", ""],
      ["PINECONE_INDEX", ""]
    ]
  }
];

export function buildEnvFile(): string {
  const lines: string[] = [];
  for (const group of ENV_GROUPS) {
    lines.push(`#${group.provider}`);
    for (const [key, value] of group.entries) {
      lines.push(`${key}=${value}`);
    }
  }
  return joinLines(lines);
}
