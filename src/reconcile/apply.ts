import type { LockSnapshot, Manager } from "../types/lock.js";
import type { SandboxExecutor } from "../types/sandbox.js";
import { runPool, type PoolOptions } from "../core/worker-pool.js";
import { ActionFailedError } from "../core/errors.js";
import { diag, silentLogger, type Logger } from "../core/diagnostics.js";
import { collectPackages } from "../collect/packages.js";
import { ensureRunning } from "../lock/builder.js";
import { planReconcile, type ActionGroup } from "./plan.js";
import { buildSourceConfigCommands } from "./sources.js";

export type GroupOutcome = {
  manager: Manager;
  status: "applied" | "failed" | "planned";
  /** Commands that ran to a zero exit, in order. */
  executed: string[];
  /** Commands never run because an earlier one failed or the batch timed out. */
  skipped: string[];
  error?: Error;
};

export type ApplyOptions = {
  /** Pool for per-manager action groups. */
  pool?: Partial<PoolOptions>;
  /** Pool for re-collecting current packages. */
  queryPool?: Partial<PoolOptions>;
  logger?: Logger;
  dryRun?: boolean;
  skipSources?: boolean;
};

export type ApplyResult = {
  ok: boolean;
  sourceCommands: string[];
  groups: ActionGroup[];
  outcomes: GroupOutcome[];
};

/** Run registry and apt source commands in order. The first failure throws. */
export async function configureSources(
  executor: SandboxExecutor,
  sandboxId: string,
  commands: readonly string[],
  logger: Logger = silentLogger,
): Promise<void> {
  for (const command of commands) {
    logger(diag("info", "SOURCE_CONFIG", `[sources] ${command.split("\n")[0]}`));
    const res = await executor.execute(sandboxId, command);
    if (res.exitCode !== 0) {
      throw new ActionFailedError("sources", command, res.exitCode, res.stderr);
    }
  }
}

async function runGroup(
  executor: SandboxExecutor,
  sandboxId: string,
  group: ActionGroup,
  logger: Logger,
): Promise<GroupOutcome> {
  const executed: string[] = [];
  for (const [i, action] of group.actions.entries()) {
    logger(diag("info", "ACTION", `[${group.manager}] ${action.command}`));
    const res = await executor.execute(sandboxId, action.command);
    if (res.exitCode !== 0) {
      return {
        manager: group.manager,
        status: "failed",
        executed,
        skipped: group.actions.slice(i + 1).map((a) => a.command),
        error: new ActionFailedError(group.manager, action.command, res.exitCode, res.stderr),
      };
    }
    executed.push(action.command);
  }
  return { manager: group.manager, status: "applied", executed, skipped: [] };
}

/**
 * Execute action groups, managers in parallel up to the pool bound and each
 * manager's actions strictly in order. A failed action stops its own manager
 * only.
 */
export async function runActionGroups(
  executor: SandboxExecutor,
  sandboxId: string,
  groups: readonly ActionGroup[],
  opts: { pool?: Partial<PoolOptions>; logger?: Logger } = {},
): Promise<GroupOutcome[]> {
  const logger = opts.logger ?? silentLogger;
  const results = await runPool(
    groups.map((group) => () => runGroup(executor, sandboxId, group, logger)),
    opts.pool,
  );

  return results.map((r, i): GroupOutcome => {
    if (r.ok) return r.value;
    return {
      manager: groups[i].manager,
      status: "failed",
      executed: [],
      skipped: groups[i].actions.map((a) => a.command),
      error: r.error,
    };
  });
}

/**
 * Restore registry and source configuration, then converge installed packages
 * on the snapshot. With `dryRun` nothing is executed and every group is
 * reported as planned.
 */
export async function reconcileSandbox(
  executor: SandboxExecutor,
  sandboxId: string,
  snapshot: LockSnapshot,
  opts: ApplyOptions = {},
): Promise<ApplyResult> {
  const logger = opts.logger ?? silentLogger;
  await ensureRunning(executor, sandboxId, logger);

  const sourceCommands = opts.skipSources ? [] : buildSourceConfigCommands(snapshot);
  if (!opts.dryRun) {
    await configureSources(executor, sandboxId, sourceCommands, logger);
  }

  const current = await collectPackages(executor, sandboxId, { pool: opts.queryPool, logger });
  const groups = planReconcile(snapshot.packages, current);

  if (opts.dryRun) {
    const outcomes = groups.map(
      (g): GroupOutcome => ({ manager: g.manager, status: "planned", executed: [], skipped: g.actions.map((a) => a.command) }),
    );
    return { ok: true, sourceCommands, groups, outcomes };
  }

  const outcomes = await runActionGroups(executor, sandboxId, groups, { pool: opts.pool, logger });
  return { ok: outcomes.every((o) => o.status !== "failed"), sourceCommands, groups, outcomes };
}
