export interface ProcessInvocation {
  command: string;
  args: string[];
  cwd: string;
  label: string;
  stdoutFile?: string;
}

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  reason?: string;
}

export type CommandRunner = (invocation: ProcessInvocation) => Promise<CommandResult>;
