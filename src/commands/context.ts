import type { DevboxConfig } from "../types/config.js";
import type { SandboxExecutor } from "../types/sandbox.js";
import { loadConfig } from "../config/loader.js";
import { resolveProject, type ResolvedProject } from "../config/projects.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { DockerSandboxExecutor } from "../sandbox/docker.js";
import { ActionFailedError, ConfigError, LockFileError, SandboxUnavailableError } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/diagnostics.js";
import { EXIT, type ExitCode } from "./exit-codes.js";

export type CommandOpts = {
  project: string;
  configDir?: string;
  envName?: string;
  env?: NodeJS.ProcessEnv;
  schemaDir?: string;
  /** Defaults to the Docker executor configured under `docker`. */
  executor?: SandboxExecutor;
  logger?: Logger;
};

export type CommandContext = {
  config: DevboxConfig;
  project: ResolvedProject;
  executor: SandboxExecutor;
  registry: SchemaRegistry;
  logger: Logger;
};

export type CommandFailure = { ok: false; error: string; exitCode: ExitCode };

export async function loadContext(opts: CommandOpts): Promise<CommandContext> {
  const logger = opts.logger ?? silentLogger;
  const registry = await createRegistry(opts.schemaDir);
  const config = await loadConfig({ configDir: opts.configDir, envName: opts.envName, env: opts.env, registry });
  const project = resolveProject(config, opts.project, logger);

  return {
    config,
    project,
    executor: opts.executor ?? new DockerSandboxExecutor(config.docker),
    registry,
    logger,
  };
}

/** Map a known error to its exit code. Anything else is rethrown. */
export function toFailure(e: unknown): CommandFailure {
  if (e instanceof ConfigError) return { ok: false, error: e.message, exitCode: EXIT.INVALID_ARGS };
  if (e instanceof SandboxUnavailableError) return { ok: false, error: e.message, exitCode: EXIT.SANDBOX_UNAVAILABLE };
  if (e instanceof LockFileError) return { ok: false, error: e.message, exitCode: EXIT.LOCK_FILE_ERROR };
  if (e instanceof ActionFailedError) return { ok: false, error: e.message, exitCode: EXIT.ACTION_FAILED };
  throw e;
}
