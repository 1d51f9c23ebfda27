import { log } from "@clack/prompts";

export interface Logger {
  info(message: string): void;
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  message(message: string): void;
}

export function createConsoleLogger(): Logger {
  return {
    info: (message) => log.info(message),
    step: (message) => log.step(message),
    success: (message) => log.success(message),
    warn: (message) => log.warn(message),
    error: (message) => log.error(message),
    message: (message) => log.message(message)
  };
}
