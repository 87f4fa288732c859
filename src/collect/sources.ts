import type { SandboxExecutor } from "../types/sandbox.js";
import type { PoolResult, PoolTask } from "../core/worker-pool.js";
import { diag, silentLogger, type Logger } from "../core/diagnostics.js";
import { contentLines } from "./parsers.js";

/** Registry and OS source configuration as observed in a box. Empty string or list = not found. */
export type SourceState = {
  aptSnapshotUrl: string;
  aptSourceLines: string[];
  aptRelease: string;
  pipIndexUrl: string;
  pipExtraIndexUrls: string[];
  npmRegistry: string;
  yarnRegistry: string;
  pnpmRegistry: string;
};

export const SOURCE_COMMANDS = {
  aptSources: "cat /etc/apt/sources.list 2>/dev/null; echo; cat /etc/apt/sources.list.d/*.list 2>/dev/null || true",
  aptRelease: ". /etc/os-release 2>/dev/null; echo $VERSION_CODENAME",
  pip:
    "(pip3 config list 2>/dev/null || pip config list 2>/dev/null); " +
    "grep -hE '^[[:space:]]*(index-url|extra-index-url)' /etc/pip.conf ~/.pip/pip.conf ~/.config/pip/pip.conf 2>/dev/null || true",
  npm: "npm config get registry 2>/dev/null",
  yarn: "yarn config get npmRegistryServer 2>/dev/null",
  pnpm: "pnpm config get registry 2>/dev/null",
} as const;

type SourceKey = keyof typeof SOURCE_COMMANDS;

const SOURCE_KEYS: SourceKey[] = ["aptSources", "aptRelease", "pip", "npm", "yarn", "pnpm"];

const SNAPSHOT_HOSTS = ["snapshot.debian.org", "snapshot.ubuntu.com"];

export function emptySourceState(): SourceState {
  return {
    aptSnapshotUrl: "",
    aptSourceLines: [],
    aptRelease: "",
    pipIndexUrl: "",
    pipExtraIndexUrls: [],
    npmRegistry: "",
    yarnRegistry: "",
    pnpmRegistry: "",
  };
}

/** Source lines plus the first URL of a line that points at an apt snapshot archive. */
export function parseAptSources(output: string): { lines: string[]; snapshotUrl: string } {
  const lines = contentLines(output);
  let snapshotUrl = "";
  for (const line of lines) {
    if (snapshotUrl !== "" || !SNAPSHOT_HOSTS.some((h) => line.includes(h))) continue;
    const url = line.split(/\s+/).find((p) => p.startsWith("http://") || p.startsWith("https://"));
    if (url) snapshotUrl = url;
  }
  return { lines, snapshotUrl };
}

const PIP_SETTING = /^(?:[\w-]+\.)?(index-url|extra-index-url)\s*=\s*(.+)$/;

function unquote(value: string): string {
  const v = value.trim();
  if (v.length >= 2 && (v[0] === "'" || v[0] === '"') && v[v.length - 1] === v[0]) return v.slice(1, -1);
  return v;
}

/**
 * `pip config list` and raw pip.conf lines. The first index-url wins;
 * extra-index-url values may hold several whitespace-separated URLs.
 */
export function parsePipConfig(output: string): { indexUrl: string; extraIndexUrls: string[] } {
  let indexUrl = "";
  const extras: string[] = [];
  for (const line of contentLines(output)) {
    const m = PIP_SETTING.exec(line);
    if (!m) continue;
    const value = unquote(m[2]);
    if (m[1] === "index-url") {
      if (indexUrl === "") indexUrl = value;
    } else {
      for (const url of value.split(/\s+/)) {
        if (url !== "" && !extras.includes(url)) extras.push(url);
      }
    }
  }
  return { indexUrl, extraIndexUrls: extras };
}

/** `npm config get` style output; `undefined`/`null` mean unset. */
export function parseRegistryValue(output: string): string {
  const v = output.trim();
  return v === "undefined" || v === "null" ? "" : v;
}

/** One read task per source key, in SOURCE_KEYS order. A non-zero exit rejects. */
export function sourceTasks(executor: SandboxExecutor, sandboxId: string): PoolTask<string>[] {
  return SOURCE_KEYS.map((key) => async () => {
    const res = await executor.execute(sandboxId, SOURCE_COMMANDS[key]);
    if (res.exitCode !== 0) {
      throw new Error(`exited ${res.exitCode}${res.stderr.trim() ? `: ${res.stderr.trim()}` : ""}`);
    }
    return res.stdout;
  });
}

/**
 * Parse the results of `sourceTasks`. Each read fails soft: an error leaves
 * that field empty and is reported as a warning.
 */
export function toSourceState(results: readonly PoolResult<string>[], logger: Logger = silentLogger): SourceState {
  const byKey = new Map<SourceKey, PoolResult<string>>(SOURCE_KEYS.map((k, i) => [k, results[i]]));

  const read = (key: SourceKey): string => {
    const r = byKey.get(key);
    if (r?.ok) return r.value;
    logger(
      diag("warn", "SOURCE_READ_FAILED", `${key}: could not read configuration (${r ? r.error.message : "no result"})`, {
        details: { command: SOURCE_COMMANDS[key] },
      }),
    );
    return "";
  };

  const state = emptySourceState();

  const apt = parseAptSources(read("aptSources"));
  state.aptSourceLines = apt.lines;
  state.aptSnapshotUrl = apt.snapshotUrl;
  state.aptRelease = read("aptRelease").trim();

  const pip = parsePipConfig(read("pip"));
  state.pipIndexUrl = pip.indexUrl;
  state.pipExtraIndexUrls = pip.extraIndexUrls;

  state.npmRegistry = parseRegistryValue(read("npm"));
  state.yarnRegistry = parseRegistryValue(read("yarn"));
  state.pnpmRegistry = parseRegistryValue(read("pnpm"));

  return state;
}
