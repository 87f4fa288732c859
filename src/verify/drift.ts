import { MANAGERS, type LockSnapshot, type Manager, type PackageLists } from "../types/lock.js";
import type { SandboxExecutor } from "../types/sandbox.js";
import type { PoolOptions } from "../core/worker-pool.js";
import { silentLogger, type Logger } from "../core/diagnostics.js";
import { collectState } from "../collect/state.js";
import type { SourceState } from "../collect/sources.js";
import { ensureRunning } from "../lock/builder.js";
import { toVersionMap } from "../lock/package-spec.js";

export type DriftField =
  | "apt.snapshotUrl"
  | "apt.pinnedRelease"
  | "apt.sourceLines"
  | "pip.indexUrl"
  | "pip.extraIndexUrls"
  | "npm.registry"
  | "yarn.registry"
  | "pnpm.registry"
  | `${Manager}.packages`;

export type DriftFinding = {
  field: DriftField;
  message: string;
  details?: Record<string, unknown>;
};

/** Case-folded, trimmed, no trailing slashes. */
export function normalizeUrl(url: string): string {
  return url.trim().toLowerCase().replace(/\/+$/, "");
}

/** Trimmed, non-empty, de-duplicated and sorted. */
export function normalizeSet(values: readonly string[], normalize: (v: string) => string = (v) => v.trim()): string[] {
  const out = new Set<string>();
  for (const v of values) {
    const n = normalize(v);
    if (n !== "") out.add(n);
  }
  return [...out].sort();
}

function setDiff(expected: readonly string[], actual: readonly string[]): { missing: string[]; unexpected: string[] } {
  const have = new Set(actual);
  const want = new Set(expected);
  return {
    missing: expected.filter((v) => !have.has(v)),
    unexpected: actual.filter((v) => !want.has(v)),
  };
}

export type PackageChange = { name: string; lock: string | null; current: string | null };

/**
 * Per-name differences between two package lists, sorted by name. Names are
 * compared case-insensitively, versions exactly.
 */
export function diffPackages(manager: Manager, lock: readonly string[], current: readonly string[]): PackageChange[] {
  const want = toVersionMap(manager, lock);
  const have = toVersionMap(manager, current);
  const changes: PackageChange[] = [];

  for (const key of new Set([...want.keys(), ...have.keys()])) {
    const w = want.get(key);
    const h = have.get(key);
    if (w && h && w.version === h.version) continue;
    changes.push({ name: w?.name ?? h?.name ?? key, lock: w?.version ?? null, current: h?.version ?? null });
  }

  return changes.sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
}

function describeChange(c: PackageChange): string {
  return `${c.name} (lock=${c.lock ?? "absent"} current=${c.current ?? "absent"})`;
}

function checkUrl(findings: DriftFinding[], field: DriftField, label: string, lock: string | undefined, current: string): void {
  if (!lock || lock.trim() === "") return;
  if (normalizeUrl(lock) !== normalizeUrl(current)) {
    findings.push({ field, message: `${label} mismatch: lock=${lock} current=${current}` });
  }
}

/**
 * Compare a snapshot to freshly collected state. Fields absent or empty in the
 * snapshot are not asserted, except package lists, which are always compared.
 * An empty result means the box matches.
 */
export function compareSnapshot(snapshot: LockSnapshot, packages: PackageLists, sources: SourceState): DriftFinding[] {
  const findings: DriftFinding[] = [];
  const apt = snapshot.aptSources;
  const reg = snapshot.registries ?? {};

  checkUrl(findings, "apt.snapshotUrl", "APT snapshot", apt.snapshotUrl, sources.aptSnapshotUrl);

  if (apt.pinnedRelease && apt.pinnedRelease.trim() !== "" && apt.pinnedRelease.trim() !== sources.aptRelease.trim()) {
    findings.push({
      field: "apt.pinnedRelease",
      message: `APT release mismatch: lock=${apt.pinnedRelease} current=${sources.aptRelease}`,
    });
  }

  const lockLines = normalizeSet(apt.sourceLines);
  if (lockLines.length > 0) {
    const { missing, unexpected } = setDiff(lockLines, normalizeSet(sources.aptSourceLines));
    if (missing.length > 0 || unexpected.length > 0) {
      findings.push({
        field: "apt.sourceLines",
        message: `APT sources.list entries drifted (${missing.length} missing, ${unexpected.length} unexpected)`,
        details: { missing, unexpected },
      });
    }
  }

  checkUrl(findings, "pip.indexUrl", "pip index-url", reg.pipIndexUrl, sources.pipIndexUrl);

  const lockExtras = normalizeSet(reg.pipExtraIndexUrls ?? [], normalizeUrl);
  if (lockExtras.length > 0) {
    const { missing, unexpected } = setDiff(lockExtras, normalizeSet(sources.pipExtraIndexUrls, normalizeUrl));
    if (missing.length > 0 || unexpected.length > 0) {
      findings.push({
        field: "pip.extraIndexUrls",
        message: `pip extra-index-urls drifted: lock=${lockExtras.join(",")} current=${normalizeSet(sources.pipExtraIndexUrls, normalizeUrl).join(",")}`,
        details: { missing, unexpected },
      });
    }
  }

  checkUrl(findings, "npm.registry", "npm registry", reg.npmRegistry, sources.npmRegistry);
  checkUrl(findings, "yarn.registry", "yarn registry", reg.yarnRegistry, sources.yarnRegistry);
  checkUrl(findings, "pnpm.registry", "pnpm registry", reg.pnpmRegistry, sources.pnpmRegistry);

  for (const manager of MANAGERS) {
    const changes = diffPackages(manager, snapshot.packages[manager], packages[manager]);
    if (changes.length === 0) continue;
    findings.push({
      field: `${manager}.packages`,
      message: `${manager} packages drifted: ${changes.map(describeChange).join("; ")}`,
      details: { changes },
    });
  }

  return findings;
}

export type VerifyOptions = {
  pool?: Partial<PoolOptions>;
  logger?: Logger;
};

/** Re-collect the box's state and compare it to `snapshot`. */
export async function verifySandbox(
  executor: SandboxExecutor,
  sandboxId: string,
  snapshot: LockSnapshot,
  opts: VerifyOptions = {},
): Promise<DriftFinding[]> {
  const logger = opts.logger ?? silentLogger;
  await ensureRunning(executor, sandboxId, logger);

  const { packages, sources } = await collectState(executor, sandboxId, { pool: opts.pool, logger });
  return compareSnapshot(snapshot, packages, sources);
}
