import { spawn } from "node:child_process";
import { closeSync, openSync } from "node:fs";

import type { CommandResult, CommandRunner, ProcessInvocation } from "./types.js";

export interface RunCommandOptions {
  maxBufferBytes?: number | undefined;
  timeoutMs?: number | undefined;
}

const DEFAULT_MAX_BUFFER_BYTES = 8 * 1024 * 1024;

function trimToTailWithinBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) return value;
  let low = 0;
  let high = value.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return value.slice(low);
}

/**
 * Runs one external command to completion and reports how it went.
 *
 * Never rejects: a missing binary, a non-zero exit or a timeout all come back as
 * `ok: false` with a `reason`, so each pipeline step can apply its own failure policy.
 * When `stdoutFile` is set the child's stdout goes straight into that file instead of
 * the captured buffer.
 */
export function runCommand(invocation: ProcessInvocation, options: RunCommandOptions = {}): Promise<CommandResult> {
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;
  const timeoutMs = options.timeoutMs;

  let stdoutFd: number | undefined;
  if (invocation.stdoutFile !== undefined) {
    try {
      stdoutFd = openSync(invocation.stdoutFile, "w");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return Promise.resolve({ ok: false, stdout: "", stderr: "", exitCode: null, reason });
    }
  }

  return new Promise((resolveResult) => {
    let stdout = "";
    let stderr = "";
    let completed = false;
    let timedOut = false;
    let stdoutTruncated = false;
    let stderrTruncated = false;
    let timeoutHandle: ReturnType<typeof setTimeout> | undefined;

    const resolveOnce = (result: CommandResult): void => {
      if (completed) return;
      completed = true;
      if (timeoutHandle) clearTimeout(timeoutHandle);
      if (stdoutFd !== undefined) {
        closeSync(stdoutFd);
        stdoutFd = undefined;
      }
      resolveResult(result);
    };

    const child = spawn(invocation.command, invocation.args, {
      cwd: invocation.cwd,
      stdio: ["ignore", stdoutFd ?? "pipe", "pipe"]
    });

    const appendChunk = (
      buffer: string,
      chunk: string
    ): {
      next: string;
      truncated: boolean;
    } => {
      const rawNext = buffer + chunk;
      return {
        next: trimToTailWithinBytes(rawNext, maxBufferBytes),
        truncated: Buffer.byteLength(rawNext, "utf8") > maxBufferBytes
      };
    };

    const withOutputTailNotice = (reason: string): string => {
      if (!stdoutTruncated && !stderrTruncated) return reason;
      return `${reason}; output truncated to last ${maxBufferBytes} bytes per stream`;
    };

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      const appended = appendChunk(stdout, chunk);
      stdout = appended.next;
      stdoutTruncated = stdoutTruncated || appended.truncated;
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      const appended = appendChunk(stderr, chunk);
      stderr = appended.next;
      stderrTruncated = stderrTruncated || appended.truncated;
    });

    child.on("error", (error) => {
      resolveOnce({
        ok: false,
        stdout,
        stderr,
        exitCode: null,
        reason: withOutputTailNotice(error.message)
      });
    });

    child.on("close", (code) => {
      if (timedOut) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          exitCode: code,
          reason: withOutputTailNotice(`timeout after ${(timeoutMs ?? 0) / 1000}s`)
        });
        return;
      }
      if (code !== 0) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          exitCode: code,
          reason: withOutputTailNotice(`exit code ${code ?? "unknown"}`)
        });
        return;
      }
      resolveOnce({
        ok: true,
        stdout,
        stderr,
        exitCode: 0
      });
    });

    if (timeoutMs !== undefined) {
      timeoutHandle = setTimeout(() => {
        timedOut = true;
        child.kill("SIGKILL");
      }, timeoutMs);
    }
  });
}

export function createCommandRunner(options: RunCommandOptions = {}): CommandRunner {
  return (invocation) => runCommand(invocation, options);
}
