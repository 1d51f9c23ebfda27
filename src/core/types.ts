export type { CreateCommandOptions } from "./types/create.js";
export type { FileArtifact } from "./types/artifacts.js";
export type { CommandResult, CommandRunner, ProcessInvocation } from "./types/process.js";
export type { ProjectSpec } from "./types/project.js";
