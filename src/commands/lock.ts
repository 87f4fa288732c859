import path from "node:path";
import type { LockSnapshot } from "../types/lock.js";
import { queryPoolOptions } from "../core/worker-pool.js";
import { defaultLockPath } from "../lock/lock-file.js";
import { lockSandbox } from "../lock/builder.js";
import { loadContext, toFailure, type CommandFailure, type CommandOpts } from "./context.js";

export type LockOpts = CommandOpts & {
  /** Defaults to `<workspace>/<lock_file>`. */
  output?: string;
  now?: () => Date;
};

export type LockResult = { ok: true; path: string; snapshot: LockSnapshot } | CommandFailure;

export async function lockProject(opts: LockOpts): Promise<LockResult> {
  try {
    const ctx = await loadContext(opts);
    const outPath = opts.output?.trim()
      ? path.resolve(opts.output)
      : defaultLockPath(ctx.project.workspacePath, ctx.config.lock_file);

    const snapshot = await lockSandbox(
      ctx.executor,
      {
        project: ctx.project.name,
        sandboxId: ctx.project.boxName,
        baseImage: ctx.project.baseImage,
        setupCommands: ctx.project.setupCommands,
      },
      outPath,
      { pool: queryPoolOptions(ctx.config.parallel), logger: ctx.logger, now: opts.now },
    );

    return { ok: true, path: outPath, snapshot };
  } catch (e) {
    return toFailure(e);
  }
}
