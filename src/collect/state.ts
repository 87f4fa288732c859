import type { PackageLists } from "../types/lock.js";
import type { SandboxExecutor } from "../types/sandbox.js";
import { runPool } from "../core/worker-pool.js";
import { packageTasks, toPackageLists, type CollectOptions } from "./packages.js";
import { sourceTasks, toSourceState, type SourceState } from "./sources.js";

export type BoxState = {
  packages: PackageLists;
  sources: SourceState;
};

/**
 * Package listings and source reads as one pool batch, so the concurrency
 * bound and the deadline cover every command issued.
 */
export async function collectState(executor: SandboxExecutor, sandboxId: string, opts: CollectOptions = {}): Promise<BoxState> {
  const pkgTasks = packageTasks(executor, sandboxId);
  const results = await runPool([...pkgTasks, ...sourceTasks(executor, sandboxId)], opts.pool);

  return {
    packages: toPackageLists(results.slice(0, pkgTasks.length), opts.logger),
    sources: toSourceState(results.slice(pkgTasks.length), opts.logger),
  };
}
