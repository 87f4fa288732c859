import type { Manager, PackageRecord } from "../types/lock.js";
import { parsePackageSpec } from "../lock/package-spec.js";

export type PackageParser = (output: string) => PackageRecord[];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Non-blank, non-comment lines, trimmed. */
export function contentLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l !== "" && !l.startsWith("#"));
}

function parseLinesWith(manager: Manager, lines: string[]): PackageRecord[] {
  const out: PackageRecord[] = [];
  for (const line of lines) {
    const rec = parsePackageSpec(manager, line);
    if (rec) out.push(rec);
  }
  return out;
}

function tryParseJson(output: string): unknown {
  const trimmed = output.trim();
  if (!trimmed.startsWith("{") && !trimmed.startsWith("[")) return undefined;
  try {
    return JSON.parse(trimmed);
  } catch {
    return undefined;
  }
}

/** `dependencies: { name: { version } }` → records. */
function fromDependencyMap(manager: Manager, node: Record<string, unknown>): PackageRecord[] {
  const deps = node.dependencies;
  if (!isRecord(deps)) return [];
  const out: PackageRecord[] = [];
  for (const [name, info] of Object.entries(deps)) {
    if (isRecord(info) && typeof info.version === "string" && info.version.trim() !== "") {
      out.push({ manager, name, version: info.version.trim() });
    }
  }
  return out;
}

/** `dpkg-query` output: `name=version` per line. */
export const parseAptOutput: PackageParser = (output) => parseLinesWith("apt", contentLines(output));

/**
 * `pip freeze` output. Lines already read `name==version`; editable installs
 * and direct references carry no `==` and are dropped.
 */
export const parsePipOutput: PackageParser = (output) => parseLinesWith("pip", contentLines(output));

/** `npm ls -g --depth=0 --json`, falling back to `name@version` lines. */
export const parseNpmOutput: PackageParser = (output) => {
  const json = tryParseJson(output);
  if (isRecord(json)) return fromDependencyMap("npm", json);
  return parseLinesWith("npm", contentLines(output));
};

/** `pnpm ls -g --depth=0 --json` (an array of projects), falling back to `name@version` lines. */
export const parsePnpmOutput: PackageParser = (output) => {
  const json = tryParseJson(output);
  if (Array.isArray(json)) {
    return json.flatMap((entry: unknown) => (isRecord(entry) ? fromDependencyMap("pnpm", entry) : []));
  }
  if (isRecord(json)) return fromDependencyMap("pnpm", json);
  return parseLinesWith("pnpm", contentLines(output));
};

const TREE_PREFIX = /^[\s│├└─|`-]+/;
const TRAILING_NOTE = /\s*\([^)]*\)\s*$/;
const YARN_BINARIES = /^info\s+"(.+)"\s+has binaries:?$/;

/**
 * `yarn global list` output. Tree-drawing prefixes (`├──`, `└──`) and a
 * trailing parenthetical are stripped before reading `name@version`;
 * `info "name@version" has binaries:` lines are accepted too.
 */
export const parseYarnOutput: PackageParser = (output) => {
  const specs: string[] = [];
  for (const line of contentLines(output)) {
    const info = YARN_BINARIES.exec(line);
    if (info) {
      specs.push(info[1]);
      continue;
    }
    const cleaned = line.replace(TREE_PREFIX, "").replace(TRAILING_NOTE, "").trim();
    if (cleaned !== "") specs.push(cleaned);
  }
  return parseLinesWith("yarn", specs);
};

export const PARSERS: Record<Manager, PackageParser> = {
  apt: parseAptOutput,
  pip: parsePipOutput,
  npm: parseNpmOutput,
  yarn: parseYarnOutput,
  pnpm: parsePnpmOutput,
};
