import path from "node:path";
import { applyPoolOptions, queryPoolOptions } from "../core/worker-pool.js";
import { diag } from "../core/diagnostics.js";
import { defaultLockPath, readLockFile } from "../lock/lock-file.js";
import { reconcileSandbox, type ApplyResult } from "../reconcile/apply.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type ApplyOpts = CommandOpts & {
  lock?: string;
  dryRun?: boolean;
  skipSources?: boolean;
};

export type ApplyCommandResult =
  | { ok: true; path: string; result: ApplyResult }
  | (CommandFailure & { result?: ApplyResult });

export async function applyProject(opts: ApplyOpts): Promise<ApplyCommandResult> {
  try {
    const ctx = await loadContext(opts);
    const lockPath = opts.lock?.trim()
      ? path.resolve(opts.lock)
      : defaultLockPath(ctx.project.workspacePath, ctx.config.lock_file);

    const snapshot = await readLockFile(lockPath, ctx.registry);
    const result = await reconcileSandbox(ctx.executor, ctx.project.boxName, snapshot, {
      pool: applyPoolOptions(ctx.config.parallel),
      queryPool: queryPoolOptions(ctx.config.parallel),
      logger: ctx.logger,
      dryRun: opts.dryRun,
      skipSources: opts.skipSources,
    });

    if (opts.dryRun) {
      for (const command of result.sourceCommands) {
        ctx.logger(diag("info", "PLANNED", `[sources] ${command}`));
      }
      for (const group of result.groups) {
        for (const action of group.actions) {
          ctx.logger(diag("info", "PLANNED", `[${group.manager}] ${action.command}`, { details: { kind: action.kind } }));
        }
      }
    }

    const failed = result.outcomes.filter((o) => o.status === "failed");
    for (const o of failed) {
      ctx.logger(
        diag("error", "ACTION_FAILED", o.error?.message ?? `[${o.manager}] failed`, {
          details: { manager: o.manager, skipped: o.skipped },
        }),
      );
    }
    if (failed.length > 0) {
      return {
        ok: false,
        error: `Reconcile failed for ${failed.map((o) => o.manager).join(", ")}; re-run verify to inspect the box`,
        exitCode: EXIT.ACTION_FAILED,
        result,
      };
    }

    if (result.groups.length === 0) {
      ctx.logger(diag("info", "CONVERGED", `${ctx.project.boxName} already matches ${lockPath}`));
    }
    return { ok: true, path: lockPath, result };
  } catch (e) {
    return toFailure(e);
  }
}
