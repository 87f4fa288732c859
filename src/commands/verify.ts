import path from "node:path";
import { queryPoolOptions } from "../core/worker-pool.js";
import { diag } from "../core/diagnostics.js";
import { defaultLockPath, readLockFile } from "../lock/lock-file.js";
import { verifySandbox, type DriftFinding } from "../verify/drift.js";
import { EXIT } from "./exit-codes.js";
import { loadContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type VerifyOpts = CommandOpts & {
  lock?: string;
};

export type VerifyResult =
  | { ok: true; path: string; findings: [] }
  | (CommandFailure & { findings: DriftFinding[] });

export async function verifyProject(opts: VerifyOpts): Promise<VerifyResult> {
  try {
    const ctx = await loadContext(opts);
    const lockPath = opts.lock?.trim()
      ? path.resolve(opts.lock)
      : defaultLockPath(ctx.project.workspacePath, ctx.config.lock_file);

    const snapshot = await readLockFile(lockPath, ctx.registry);
    const findings = await verifySandbox(ctx.executor, ctx.project.boxName, snapshot, {
      pool: queryPoolOptions(ctx.config.parallel),
      logger: ctx.logger,
    });

    if (findings.length > 0) {
      for (const f of findings) {
        ctx.logger(diag("error", "DRIFT", f.message, { path: lockPath, details: { field: f.field, ...f.details } }));
      }
      return {
        ok: false,
        error: `Drift detected: ${findings.length} finding(s) against ${lockPath}`,
        exitCode: EXIT.DRIFT_DETECTED,
        findings,
      };
    }

    return { ok: true, path: lockPath, findings: [] };
  } catch (e) {
    return { ...toFailure(e), findings: [] };
  }
}
