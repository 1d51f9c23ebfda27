import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { DirectoryCreateError, DirectoryExistsError, ExternalCommandError } from "../src/core/errors.js";
import { STRICT_FAILURE_POLICY } from "../src/core/policy.js";
import { runPipeline } from "../src/core/sequencer.js";
import type { ProjectSpec } from "../src/core/types.js";
import { FROZEN_REQUIREMENTS, createFakeRunner, createRecordingLogger } from "./fakes.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), "pyseed-pipeline-"));
  tempDirs.push(dir);
  return dir;
}

function demoSpec(overrides: Partial<ProjectSpec> = {}): ProjectSpec {
  return {
    directory: "demo",
    venvName: "env1",
    pythonVersion: "3.12.0",
    packages: ["requests"],
    ...overrides
  };
}

function snapshotTree(root: string): Map<string, string> {
  const snapshot = new Map<string, string>();
  for (const entry of readdirSync(root, { encoding: "utf8", recursive: true })) {
    const path = join(root, entry);
    snapshot.set(entry, statSync(path).isDirectory() ? "<dir>" : readFileSync(path, "utf8"));
  }
  return snapshot;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("runPipeline", () => {
  it("creates the fixed layout and every generated file", async () => {
    const cwd = makeTempDir();
    const { runner } = createFakeRunner();
    const report = await runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner });
    const root = join(cwd, "demo");

    expect(report.rootDir).toBe(root);
    expect(report.warnings).toEqual([]);
    for (const directory of ["app", "config", "WORKSPACE", "config/RONTESTING", "config/tests"]) {
      expect(statSync(join(root, directory)).isDirectory()).toBe(true);
    }
    expect(snapshotTree(root).size).toBe(18);
    expect(readFileSync(join(root, "config/database.sqlite3"), "utf8")).toBe("");
    expect(readFileSync(join(root, "config/requirements.txt"), "utf8")).toBe(FROZEN_REQUIREMENTS);
    expect(report.lockFileCaptured).toBe(true);
    expect(report.repositoryInitialized).toBe(true);
  });

  it("renders the demo scenario files", async () => {
    const cwd = makeTempDir();
    const { runner } = createFakeRunner();
    await runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner });
    const root = join(cwd, "demo");

    expect(readFileSync(join(root, "config/.env"), "utf8").split("\n")).toContain("OPENAI_API_KEY=");
    expect(readFileSync(join(root, "config/docker-compose.yml"), "utf8").split("\n")[2]).toBe("  demo:");
    expect(readFileSync(join(root, "config/README.md"), "utf8").split("\n")[0]).toBe("# demo");
  });

  it("issues external commands in pipeline order", async () => {
    const cwd = makeTempDir();
    const { runner, calls } = createFakeRunner();
    await runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner });
    const root = join(cwd, "demo");
    const pip = join(root, "config/env1/bin/pip");

    expect(calls.map((call) => [call.command, ...call.args])).toEqual([
      ["virtualenv", "-p", "python3.12.0", "config/env1"],
      [pip, "install", "requests"],
      [pip, "install", "python-dotenv"],
      [pip, "install", "pylint"],
      [pip, "install", "openai"],
      [pip, "freeze"],
      ["git", "init"],
      ["git", "checkout", "-b", "main"],
      ["git", "add", "."],
      ["git", "commit", "-m", "Initial commit"],
      ["tree", "-I", "env1|.DS_Store"]
    ]);
    expect(calls.every((call) => call.cwd === root)).toBe(true);
    expect(calls[5]?.stdoutFile).toBe(join(root, "config/requirements.txt"));
  });

  it("keeps repeated package names", async () => {
    const cwd = makeTempDir();
    const { runner } = createFakeRunner();
    const report = await runPipeline(demoSpec({ packages: ["numpy", "numpy"] }), {
      cwd,
      logger: createRecordingLogger(),
      runner
    });

    expect(report.installedPackages).toEqual(["numpy", "numpy", "python-dotenv", "pylint", "openai"]);
  });

  it("fails on an existing directory without writing or running anything", async () => {
    const cwd = makeTempDir();
    mkdirSync(join(cwd, "demo"));
    writeFileSync(join(cwd, "demo", "keep.txt"), "mine");
    const { runner, calls } = createFakeRunner();

    await expect(runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner })).rejects.toBeInstanceOf(
      DirectoryExistsError
    );
    expect(calls).toEqual([]);
    expect(readdirSync(join(cwd, "demo"))).toEqual(["keep.txt"]);
  });

  it("fails when the target path is an existing file", async () => {
    const cwd = makeTempDir();
    writeFileSync(join(cwd, "demo"), "");
    const { runner } = createFakeRunner();

    await expect(runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner })).rejects.toThrow(
      `Directory ${join(cwd, "demo")} already exists.`
    );
  });

  it("fails with a creation error when a parent segment is a file", async () => {
    const cwd = makeTempDir();
    writeFileSync(join(cwd, "file.txt"), "");
    const { runner, calls } = createFakeRunner();

    await expect(
      runPipeline(demoSpec({ directory: "file.txt/demo" }), { cwd, logger: createRecordingLogger(), runner })
    ).rejects.toBeInstanceOf(DirectoryCreateError);
    expect(calls).toEqual([]);
    expect(readFileSync(join(cwd, "file.txt"), "utf8")).toBe("");
  });

  it("leaves the first scaffold unchanged when run twice", async () => {
    const cwd = makeTempDir();
    const { runner } = createFakeRunner();
    await runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner });
    const before = snapshotTree(join(cwd, "demo"));

    await expect(runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner })).rejects.toBeInstanceOf(
      DirectoryExistsError
    );
    expect(snapshotTree(join(cwd, "demo"))).toEqual(before);
  });

  it("warns about a failed install and keeps installing the rest", async () => {
    const cwd = makeTempDir();
    const logger = createRecordingLogger();
    const { runner, calls } = createFakeRunner((call) => call.args.join(" ") === "install requests");
    const report = await runPipeline(demoSpec(), { cwd, logger, runner });
    const pip = join(cwd, "demo", "config/env1/bin/pip");

    expect(report.failedPackages).toEqual(["requests"]);
    expect(report.installedPackages).toEqual(["python-dotenv", "pylint", "openai"]);
    expect(calls.filter((call) => call.args[0] === "install")).toHaveLength(4);
    expect(report.warnings).toEqual([
      {
        step: "install",
        label: "Install requests",
        command: `${pip} install requests`,
        message: `Install requests failed: ${pip} install requests (exit code 1: boom)`
      }
    ]);
    expect(logger.entries).toContainEqual({
      level: "warn",
      message: `Install requests failed: ${pip} install requests (exit code 1: boom)`
    });
  });

  it("issues every git step even when an earlier one fails", async () => {
    const cwd = makeTempDir();
    const { runner, calls } = createFakeRunner((call) => call.command === "git" && call.args[0] === "init");
    const report = await runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner });

    expect(calls.filter((call) => call.command === "git")).toHaveLength(4);
    expect(report.repositoryInitialized).toBe(false);
    expect(report.warnings.map((warning) => warning.step)).toEqual(["git"]);
  });

  it("aborts on the first failed command under the strict policy", async () => {
    const cwd = makeTempDir();
    const { runner, calls } = createFakeRunner((call) => call.command === "virtualenv");

    await expect(
      runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner, policy: STRICT_FAILURE_POLICY })
    ).rejects.toBeInstanceOf(ExternalCommandError);
    expect(calls).toHaveLength(1);
  });

  it("skips git and the tree listing when disabled", async () => {
    const cwd = makeTempDir();
    const { runner, calls } = createFakeRunner();
    const report = await runPipeline(demoSpec(), {
      cwd,
      logger: createRecordingLogger(),
      runner,
      initializeGit: false,
      listTree: false
    });

    expect(calls.some((call) => call.command === "git" || call.command === "tree")).toBe(false);
    expect(report.repositoryInitialized).toBe(false);
    expect(report.tree).toBeUndefined();
  });

  it("prints the tree listing and the activation hint", async () => {
    const cwd = makeTempDir();
    const logger = createRecordingLogger();
    const { runner } = createFakeRunner();
    const report = await runPipeline(demoSpec(), { cwd, logger, runner });
    const printed = logger.entries.filter((entry) => entry.level === "message").map((entry) => entry.message);

    expect(report.tree).toBe(".\n├── app\n└── config");
    expect(printed[0]).toBe(".\n├── app\n└── config");
    expect(printed[1]).toContain("source demo/config/env1/bin/activate && cd demo/config/ && docker-compose up -d");
  });

  it("records a missing tree binary as a warning", async () => {
    const cwd = makeTempDir();
    const { runner } = createFakeRunner((call) => call.command === "tree");
    const report = await runPipeline(demoSpec(), { cwd, logger: createRecordingLogger(), runner });

    expect(report.tree).toBeUndefined();
    expect(report.warnings.map((warning) => warning.step)).toEqual(["tree"]);
  });

  it("seeds the env file from an existing one", async () => {
    const cwd = makeTempDir();
    writeFileSync(join(cwd, "source.env"), "OPENAI_API_KEY=test-secret\n");
    const { runner } = createFakeRunner();
    await runPipeline(demoSpec({ envSource: join(cwd, "source.env") }), {
      cwd,
      logger: createRecordingLogger(),
      runner
    });

    expect(readFileSync(join(cwd, "demo", "config/.env"), "utf8")).toBe("OPENAI_API_KEY=test-secret\n");
    expect(existsSync(join(cwd, "source.env"))).toBe(true);
  });
});
