import type { Manager } from "../types/lock.js";

export class DevboxError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
    this.name = "DevboxError";
  }
}

/** The box does not exist, or is stopped and could not be started. */
export class SandboxUnavailableError extends DevboxError {
  constructor(readonly sandboxId: string, reason: string) {
    super(`Sandbox '${sandboxId}' unavailable: ${reason}`, "SANDBOX_UNAVAILABLE");
    this.name = "SandboxUnavailableError";
  }
}

export class LockFileError extends DevboxError {
  constructor(message: string, readonly path: string) {
    super(message, "LOCK_FILE_INVALID");
    this.name = "LockFileError";
  }
}

export class ConfigError extends DevboxError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export class PoolTimeoutError extends DevboxError {
  constructor(readonly index: number, deadlineMs: number) {
    super(`Task ${index} did not complete within ${deadlineMs}ms`, "POOL_TIMEOUT");
    this.name = "PoolTimeoutError";
  }
}

/** A corrective or configuration command exited non-zero. */
export class ActionFailedError extends DevboxError {
  constructor(
    readonly manager: Manager | "sources",
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(
      `[${manager}] command failed (exit ${exitCode}): ${command}${stderr ? `\n${stderr.trim()}` : ""}`,
      "ACTION_FAILED",
    );
    this.name = "ActionFailedError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
