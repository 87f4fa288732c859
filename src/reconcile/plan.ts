import { MANAGERS, type Manager, type PackageLists, type PackageRecord } from "../types/lock.js";
import { formatPackageSpec, toVersionMap } from "../lock/package-spec.js";
import { shellJoin } from "./shell.js";

export type ActionKind = "refresh" | "install" | "remove" | "autoremove";

export type ReconcileAction = {
  manager: Manager;
  kind: ActionKind;
  /** Pinned specs for installs, bare names for removals. */
  packages: string[];
  command: string;
};

/** Ordered actions for one manager. Groups for different managers are independent. */
export type ActionGroup = {
  manager: Manager;
  actions: ReconcileAction[];
};

export type PackageDelta = {
  install: PackageRecord[];
  remove: PackageRecord[];
};

const APT_ENV = "DEBIAN_FRONTEND=noninteractive";

/** Per-package install and removal argv for the non-apt managers. */
const SINGLE_COMMANDS: Record<Exclude<Manager, "apt">, { install: string[]; remove: string[] }> = {
  pip: { install: ["python3", "-m", "pip", "install"], remove: ["python3", "-m", "pip", "uninstall", "-y"] },
  npm: { install: ["npm", "install", "-g"], remove: ["npm", "uninstall", "-g"] },
  yarn: { install: ["yarn", "global", "add"], remove: ["yarn", "global", "remove"] },
  pnpm: { install: ["pnpm", "add", "-g"], remove: ["pnpm", "remove", "-g"] },
};

function byName(a: PackageRecord, b: PackageRecord): number {
  const x = a.name.toLowerCase();
  const y = b.name.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Install every target entry whose name is missing from `current` or pinned
 * to a different version; remove every current entry whose name is not in
 * `target`. Both lists are sorted by name.
 */
export function diffManager(manager: Manager, target: readonly string[], current: readonly string[]): PackageDelta {
  const want = toVersionMap(manager, target);
  const have = toVersionMap(manager, current);

  const install = [...want.entries()]
    .filter(([key, rec]) => have.get(key)?.version !== rec.version)
    .map(([, rec]) => rec)
    .sort(byName);
  const remove = [...have.entries()]
    .filter(([key]) => !want.has(key))
    .map(([, rec]) => rec)
    .sort(byName);

  return { install, remove };
}

function aptActions(delta: PackageDelta): ReconcileAction[] {
  if (delta.install.length === 0 && delta.remove.length === 0) return [];

  const actions: ReconcileAction[] = [{ manager: "apt", kind: "refresh", packages: [], command: "apt-get update" }];

  if (delta.install.length > 0) {
    const specs = delta.install.map(formatPackageSpec);
    actions.push({
      manager: "apt",
      kind: "install",
      packages: specs,
      command: `${APT_ENV} ${shellJoin(["apt-get", "install", "-y", "--allow-downgrades", ...specs])}`,
    });
  }

  if (delta.remove.length > 0) {
    const names = delta.remove.map((r) => r.name);
    actions.push(
      {
        manager: "apt",
        kind: "remove",
        packages: names,
        command: `${APT_ENV} ${shellJoin(["apt-get", "remove", "-y", ...names])}`,
      },
      { manager: "apt", kind: "autoremove", packages: [], command: `${APT_ENV} apt-get autoremove -y` },
    );
  }

  return actions;
}

function singleActions(manager: Exclude<Manager, "apt">, delta: PackageDelta): ReconcileAction[] {
  const argv = SINGLE_COMMANDS[manager];
  const installs = delta.install.map((rec): ReconcileAction => {
    const spec = formatPackageSpec(rec);
    return { manager, kind: "install", packages: [spec], command: shellJoin([...argv.install, spec]) };
  });
  const removals = delta.remove.map(
    (rec): ReconcileAction => ({ manager, kind: "remove", packages: [rec.name], command: shellJoin([...argv.remove, rec.name]) }),
  );
  return [...installs, ...removals];
}

export function planManager(manager: Manager, target: readonly string[], current: readonly string[]): ReconcileAction[] {
  const delta = diffManager(manager, target, current);
  return manager === "apt" ? aptActions(delta) : singleActions(manager, delta);
}

/** One group per manager with at least one action, in manager order. Empty when converged. */
export function planReconcile(target: PackageLists, current: PackageLists): ActionGroup[] {
  const groups: ActionGroup[] = [];
  for (const manager of MANAGERS) {
    const actions = planManager(manager, target[manager], current[manager]);
    if (actions.length > 0) groups.push({ manager, actions });
  }
  return groups;
}
