export function normalizeMarkdown(content: string): string {
  return content.replace(/\r\n/g, "\n").trimEnd() + "\n";
}

export function joinLines(lines: readonly string[]): string {
  return normalizeMarkdown(lines.join("\n"));
}

export function banner(lines: readonly string[], width = 118): string[] {
  const rule = "#".repeat(width);
  return ["", rule, "", ...lines, "", rule, ""];
}
