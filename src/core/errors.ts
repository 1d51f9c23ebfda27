import type { CommandResult, ProcessInvocation } from "./types.js";

const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface ScaffoldErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class ScaffoldError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: ScaffoldErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends ScaffoldError {
  constructor(message: string, options: ScaffoldErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class DirectoryExistsError extends ScaffoldError {
  readonly path: string;

  constructor(path: string) {
    super(`Directory ${path} already exists.`, "DIRECTORY_EXISTS", EXIT_CODE_OPERATIONAL_FAILURE, {
      details: { path }
    });
    this.path = path;
  }
}

export class DirectoryCreateError extends ScaffoldError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to create directory ${path}: ${reason}`, "DIRECTORY_CREATE", EXIT_CODE_OPERATIONAL_FAILURE, {
      cause,
      details: { path }
    });
    this.path = path;
  }
}

export class ExternalCommandError extends ScaffoldError {
  readonly invocation: ProcessInvocation;
  readonly result: CommandResult;

  constructor(invocation: ProcessInvocation, result: CommandResult) {
    super(
      `${invocation.label} failed: ${formatCommandLine(invocation)} (${result.reason ?? "unknown"})`,
      "EXTERNAL_COMMAND",
      EXIT_CODE_OPERATIONAL_FAILURE,
      {
        details: {
          command: invocation.command,
          args: invocation.args,
          exitCode: result.exitCode
        }
      }
    );
    this.invocation = invocation;
    this.result = result;
  }
}

export class ExecutionError extends ScaffoldError {
  constructor(message: string, options: ScaffoldErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export function formatCommandLine(invocation: Pick<ProcessInvocation, "command" | "args">): string {
  return [invocation.command, ...invocation.args].join(" ");
}

function isCommanderErrorLike(error: unknown): error is { code: string } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): ScaffoldError {
  if (error instanceof ScaffoldError) return error;
  if (isCommanderErrorLike(error) && error.code.startsWith("commander.")) {
    const message = error instanceof Error ? error.message : error.code;
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: error.code
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

const COMMANDER_SUCCESS_CODES = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

// commander prints its own usage errors, help and version output before throwing.
export function isReportedByCommander(error: ScaffoldError): boolean {
  return typeof error.details?.commanderCode === "string";
}

export function isCommanderSuccessExit(error: ScaffoldError): boolean {
  const code = error.details?.commanderCode;
  return typeof code === "string" && COMMANDER_SUCCESS_CODES.has(code);
}
