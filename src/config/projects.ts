import fs from "node:fs";
import path from "node:path";
import type { DevboxConfig } from "../types/config.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import { diag, silentLogger, type Logger } from "../core/diagnostics.js";

export type ResolvedProject = {
  name: string;
  boxName: string;
  workspacePath: string;
  baseImage: string;
  setupCommands: string[];
};

/** Checked in order; the first one present is used. */
export const WORKSPACE_CONFIG_FILES = ["devbox.json", "devbox.project.json", ".devbox.json"];

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * `setup_commands` from the workspace's own devbox file, or null when there is
 * none. An unreadable file is reported and treated as absent.
 */
export function readWorkspaceSetupCommands(workspacePath: string, logger: Logger = silentLogger): string[] | null {
  const file = WORKSPACE_CONFIG_FILES.map((f) => path.join(workspacePath, f)).find((p) => fs.existsSync(p));
  if (!file) return null;

  let doc: unknown;
  try {
    doc = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    logger(diag("warn", "WORKSPACE_CONFIG_INVALID", `Ignoring ${file}: ${errorMessage(e)}`, { path: file }));
    return null;
  }

  if (typeof doc !== "object" || doc === null || !("setup_commands" in doc)) return null;
  const commands = doc.setup_commands;
  if (!isStringArray(commands)) {
    logger(diag("warn", "WORKSPACE_CONFIG_INVALID", `Ignoring setup_commands in ${file}: expected a list of strings`, { path: file }));
    return null;
  }
  return commands;
}

export function resolveProject(config: DevboxConfig, name: string, logger: Logger = silentLogger): ResolvedProject {
  const entry = Object.hasOwn(config.projects, name) ? config.projects[name] : undefined;
  if (!entry) {
    const known = Object.keys(config.projects).sort();
    throw new ConfigError(
      `Project '${name}' not found${known.length > 0 ? ` (configured: ${known.join(", ")})` : ""}`,
    );
  }

  const fromWorkspace = readWorkspaceSetupCommands(entry.workspace_path, logger);

  return {
    name,
    boxName: entry.box_name,
    workspacePath: entry.workspace_path,
    baseImage: entry.base_image,
    setupCommands: fromWorkspace && fromWorkspace.length > 0 ? fromWorkspace : (entry.setup_commands ?? []),
  };
}
