import type { Manager, PackageRecord } from "../types/lock.js";

/** Separator between name and version in each manager's canonical string. */
export const SEPARATORS: Record<Manager, string> = {
  apt: "=",
  pip: "==",
  npm: "@",
  yarn: "@",
  pnpm: "@",
};

/**
 * Parse `name<sep>version` for the given manager. Node managers split on the
 * last `@` so scoped names (`@scope/pkg@1.0.0`) survive.
 * Returns null for blank or unparseable input.
 */
export function parsePackageSpec(manager: Manager, spec: string): PackageRecord | null {
  const s = spec.trim();
  if (s === "") return null;

  const sep = SEPARATORS[manager];
  const idx = sep === "@" ? s.lastIndexOf(sep) : s.indexOf(sep);
  if (idx <= 0) return null;

  const name = s.slice(0, idx).trim();
  const version = s.slice(idx + sep.length).trim();
  if (name === "" || version === "") return null;

  return { manager, name, version };
}

export function formatPackageSpec(record: PackageRecord): string {
  return `${record.name}${SEPARATORS[record.manager]}${record.version}`;
}

/**
 * Lower-cased name → record. Unparseable entries are skipped; for repeated
 * names the first occurrence wins.
 */
export function toVersionMap(manager: Manager, specs: readonly string[]): Map<string, PackageRecord> {
  const map = new Map<string, PackageRecord>();
  for (const spec of specs) {
    const rec = parsePackageSpec(manager, spec);
    if (!rec) continue;
    const key = rec.name.toLowerCase();
    if (!map.has(key)) map.set(key, rec);
  }
  return map;
}

/** Entries of `specs` that do not parse with the manager's separator. */
export function findUnparseable(manager: Manager, specs: readonly string[]): string[] {
  return specs.filter((s) => s.trim() !== "" && parsePackageSpec(manager, s) === null);
}

/** Names listed more than once, ignoring case, each in its first spelling. */
export function findDuplicateNames(manager: Manager, specs: readonly string[]): string[] {
  const first = new Map<string, string>();
  const dupes = new Set<string>();
  for (const spec of specs) {
    const rec = parsePackageSpec(manager, spec);
    if (!rec) continue;
    const key = rec.name.toLowerCase();
    const seen = first.get(key);
    if (seen === undefined) first.set(key, rec.name);
    else dupes.add(seen);
  }
  return [...dupes];
}
