import { ExternalCommandError, formatCommandLine } from "./errors.js";
import type { Logger } from "./logger.js";
import type { CommandResult, ProcessInvocation } from "./types.js";

export type ExternalStep = "virtualenv" | "install" | "freeze" | "git" | "tree";
export type FailureAction = "warn" | "abort";
export type FailurePolicy = Readonly<Record<ExternalStep, FailureAction>>;

export const DEFAULT_FAILURE_POLICY: FailurePolicy = {
  virtualenv: "warn",
  install: "warn",
  freeze: "warn",
  git: "warn",
  tree: "warn"
};

export const STRICT_FAILURE_POLICY: FailurePolicy = {
  virtualenv: "abort",
  install: "abort",
  freeze: "abort",
  git: "abort",
  tree: "abort"
};

const MAX_SNIPPET_CHARS = 320;

export interface StepWarning {
  step: ExternalStep;
  label: string;
  command: string;
  message: string;
}

export function describeFailure(invocation: ProcessInvocation, result: CommandResult): string {
  const snippet = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  const clipped = snippet.length > MAX_SNIPPET_CHARS ? `${snippet.slice(0, MAX_SNIPPET_CHARS)}...` : snippet;
  return `${invocation.label} failed: ${formatCommandLine(invocation)} (${result.reason ?? "unknown"}${clipped ? `: ${clipped}` : ""})`;
}

/**
 * Applies the policy entry for `step` to a failed command. Aborting throws
 * `ExternalCommandError`; warning logs it and hands back a record for the report.
 */
export function handleCommandFailure(
  step: ExternalStep,
  invocation: ProcessInvocation,
  result: CommandResult,
  policy: FailurePolicy,
  logger: Logger
): StepWarning {
  if (policy[step] === "abort") {
    throw new ExternalCommandError(invocation, result);
  }
  const message = describeFailure(invocation, result);
  logger.warn(message);
  return {
    step,
    label: invocation.label,
    command: formatCommandLine(invocation),
    message
  };
}
