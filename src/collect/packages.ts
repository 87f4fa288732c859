import { MANAGERS, type Manager, type PackageLists, type PackageRecord } from "../types/lock.js";
import type { SandboxExecutor } from "../types/sandbox.js";
import { runPool, type PoolOptions, type PoolResult, type PoolTask } from "../core/worker-pool.js";
import { diag, silentLogger, type Logger } from "../core/diagnostics.js";
import { formatPackageSpec } from "../lock/package-spec.js";
import { PARSERS } from "./parsers.js";

/** One read-only listing command per manager. */
export const LIST_COMMANDS: Record<Manager, string> = {
  apt: "dpkg-query -W -f='${Package}=${Version}\\n' $(apt-mark showmanual 2>/dev/null) 2>/dev/null | sort",
  pip: "python3 -m pip freeze 2>/dev/null || pip3 freeze 2>/dev/null",
  npm: "npm ls -g --depth=0 --json 2>/dev/null || true",
  yarn: "yarn global list --depth=0 2>/dev/null",
  pnpm: "pnpm ls -g --depth=0 --json 2>/dev/null || true",
};

export type CollectOptions = {
  pool?: Partial<PoolOptions>;
  logger?: Logger;
};

export function emptyPackageLists(): PackageLists {
  return { apt: [], pip: [], npm: [], yarn: [], pnpm: [] };
}

/** Drop repeated names (case-insensitive, first wins) and format as canonical strings. */
export function canonicalize(records: PackageRecord[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const rec of records) {
    const key = rec.name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(formatPackageSpec(rec));
  }
  return out;
}

/** One listing task per manager, in MANAGERS order. A non-zero exit rejects. */
export function packageTasks(executor: SandboxExecutor, sandboxId: string): PoolTask<string>[] {
  return MANAGERS.map((manager) => async () => {
    const res = await executor.execute(sandboxId, LIST_COMMANDS[manager]);
    if (res.exitCode !== 0) {
      throw new Error(`listing exited ${res.exitCode}${res.stderr.trim() ? `: ${res.stderr.trim()}` : ""}`);
    }
    return res.stdout;
  });
}

/**
 * Parse the results of `packageTasks`. A manager that is missing, whose
 * listing exits non-zero, or that timed out is recorded as an empty list and
 * reported as a warning, never thrown.
 */
export function toPackageLists(results: readonly PoolResult<string>[], logger: Logger = silentLogger): PackageLists {
  const lists = emptyPackageLists();

  MANAGERS.forEach((manager, i) => {
    const result = results[i];
    if (!result.ok) {
      logger(
        diag("warn", "COLLECT_FAILED", `${manager}: no packages collected (${result.error.message})`, {
          details: { manager, command: LIST_COMMANDS[manager] },
        }),
      );
      return;
    }
    lists[manager] = canonicalize(PARSERS[manager](result.value));
  });

  return lists;
}

/** Collect installed packages for every manager in parallel. */
export async function collectPackages(
  executor: SandboxExecutor,
  sandboxId: string,
  opts: CollectOptions = {},
): Promise<PackageLists> {
  const results = await runPool(packageTasks(executor, sandboxId), opts.pool);
  return toPackageLists(results, opts.logger);
}
