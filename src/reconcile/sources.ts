import type { LockSnapshot } from "../types/lock.js";
import { heredocWrite, shellQuote } from "./shell.js";

export const APT_SOURCES_LIST = "/etc/apt/sources.list";
export const APT_DEFAULT_RELEASE_FILE = "/etc/apt/apt.conf.d/99defaultrelease";
export const PIP_CONF = "/etc/pip.conf";

function nonEmpty(values: readonly string[] | undefined): string[] {
  return (values ?? []).map((v) => v.trim()).filter((v) => v !== "");
}

/**
 * Commands that put the snapshot's apt sources, pinned release and registry
 * settings back in place. Run in order before any package is reconciled.
 */
export function buildSourceConfigCommands(snapshot: LockSnapshot): string[] {
  const cmds: string[] = [];
  const apt = snapshot.aptSources;
  const reg = snapshot.registries ?? {};

  const lines = nonEmpty(apt.sourceLines);
  if (lines.length > 0) {
    cmds.push(
      `cp ${APT_SOURCES_LIST} ${APT_SOURCES_LIST}.bak 2>/dev/null || true`,
      "rm -f /etc/apt/sources.list.d/*.list 2>/dev/null || true",
      heredocWrite(APT_SOURCES_LIST, lines),
    );
  }

  const release = apt.pinnedRelease?.trim();
  if (release) {
    cmds.push(`printf '%s\\n' ${shellQuote(`APT::Default-Release "${release}";`)} > ${APT_DEFAULT_RELEASE_FILE}`);
  }

  if (lines.length > 0) cmds.push("apt-get update");

  const pipIndex = reg.pipIndexUrl?.trim();
  const pipExtras = nonEmpty(reg.pipExtraIndexUrls);
  if (pipIndex || pipExtras.length > 0) {
    const conf = ["[global]"];
    if (pipIndex) conf.push(`index-url = ${pipIndex}`);
    // pip.conf is read with configparser, which rejects a repeated key
    if (pipExtras.length > 0) conf.push(`extra-index-url = ${pipExtras.join(" ")}`);
    cmds.push(heredocWrite(PIP_CONF, conf));
  }

  const npm = reg.npmRegistry?.trim();
  if (npm) cmds.push(`npm config set registry ${shellQuote(npm)} -g`);
  const yarn = reg.yarnRegistry?.trim();
  if (yarn) cmds.push(`yarn config set npmRegistryServer ${shellQuote(yarn)} -g`);
  const pnpm = reg.pnpmRegistry?.trim();
  if (pnpm) cmds.push(`pnpm config set registry ${shellQuote(pnpm)} -g`);

  return cmds;
}
