import { describe, expect, it } from "vitest";
import { diffManager, planManager, planReconcile } from "../src/reconcile/plan.js";
import { buildSourceConfigCommands } from "../src/reconcile/sources.js";
import { heredocWrite, shellQuote } from "../src/reconcile/shell.js";
import { toVersionMap } from "../src/lock/package-spec.js";
import type { Manager } from "../src/types/lock.js";
import { makeSnapshot, packages } from "./fixtures/snapshots.js";

describe("planReconcile", () => {
  it("pins a changed apt package in one install and removes nothing", () => {
    const groups = planReconcile(packages({ apt: ["curl=7.68.0-1"] }), packages({ apt: ["curl=7.81.0-1ubuntu1"] }));

    expect(groups).toHaveLength(1);
    const actions = groups[0].actions;
    expect(actions.map((a) => a.kind)).toEqual(["refresh", "install"]);
    expect(actions[1].packages).toEqual(["curl=7.68.0-1"]);
    expect(actions[1].command).toBe("DEBIAN_FRONTEND=noninteractive apt-get install -y --allow-downgrades curl=7.68.0-1");
  });

  it("installs a missing pip package and uninstalls nothing", () => {
    const groups = planReconcile(packages({ pip: ["requests==2.28.0"] }), packages());
    expect(groups).toEqual([
      {
        manager: "pip",
        actions: [
          { manager: "pip", kind: "install", packages: ["requests==2.28.0"], command: "python3 -m pip install requests==2.28.0" },
        ],
      },
    ]);
  });

  it("removes an npm package absent from an empty locked list", () => {
    const groups = planReconcile(packages(), packages({ npm: ["typescript@5.0.0"] }));
    expect(groups).toEqual([
      {
        manager: "npm",
        actions: [{ manager: "npm", kind: "remove", packages: ["typescript"], command: "npm uninstall -g typescript" }],
      },
    ]);
  });

  it("produces nothing when current already matches", () => {
    const lists = packages({ apt: ["curl=1"], yarn: ["@scope/tool@0.4.1"] });
    expect(planReconcile(lists, packages({ apt: ["curl=1"], yarn: ["@scope/tool@0.4.1"] }))).toEqual([]);
  });

  it("batches apt installs and removals, then autoremoves", () => {
    const actions = planManager("apt", ["zlib1g=1:1.2.13", "curl=7.68.0-1"], ["vim=2:9.0", "htop=3.2.2", "curl=7.68.0-1"]);
    expect(actions.map((a) => a.command)).toEqual([
      "apt-get update",
      "DEBIAN_FRONTEND=noninteractive apt-get install -y --allow-downgrades zlib1g=1:1.2.13",
      "DEBIAN_FRONTEND=noninteractive apt-get remove -y htop vim",
      "DEBIAN_FRONTEND=noninteractive apt-get autoremove -y",
    ]);
  });

  it("emits one command per package for the other managers, installs before removals", () => {
    expect(planManager("yarn", ["b@1.0.0", "a@1.0.0"], ["c@1.0.0"]).map((a) => a.command)).toEqual([
      "yarn global add a@1.0.0",
      "yarn global add b@1.0.0",
      "yarn global remove c",
    ]);
    expect(planManager("pnpm", ["@scope/pkg@2.0.0"], ["@scope/pkg@1.0.0"]).map((a) => a.command)).toEqual([
      "pnpm add -g @scope/pkg@2.0.0",
    ]);
  });

  it("uses the locked name's spelling for installs and the current spelling for removals", () => {
    expect(planManager("pip", ["Flask==3.0.0"], ["flask==2.0.0", "Jinja2==3.1.0"]).map((a) => a.command)).toEqual([
      "python3 -m pip install Flask==3.0.0",
      "python3 -m pip uninstall -y Jinja2",
    ]);
  });
});

describe("set-difference property", () => {
  const cases: Array<{ manager: Manager; target: string[]; current: string[] }> = [
    { manager: "npm", target: ["a@1", "b@2", "c@3"], current: ["b@2", "c@4", "d@5"] },
    { manager: "pip", target: [], current: ["x==1", "y==2"] },
    { manager: "apt", target: ["p=1", "q=2"], current: [] },
    { manager: "yarn", target: ["@s/a@1", "@s/b@2"], current: ["@s/a@1", "@s/b@3", "@s/c@1"] },
  ];

  it.each(cases)("install and removal sets match the map difference for $manager", ({ manager, target, current }) => {
    const t = toVersionMap(manager, target);
    const c = toVersionMap(manager, current);
    const expectedInstall = [...t.entries()].filter(([k, r]) => c.get(k)?.version !== r.version).map(([k]) => k).sort();
    const expectedRemove = [...c.keys()].filter((k) => !t.has(k)).sort();

    const delta = diffManager(manager, target, current);

    expect(delta.install.map((r) => r.name.toLowerCase()).sort()).toEqual(expectedInstall);
    expect(delta.remove.map((r) => r.name.toLowerCase()).sort()).toEqual(expectedRemove);
    for (const rec of delta.install) expect(rec.version).toBe(t.get(rec.name.toLowerCase())?.version);
  });

  it.each(cases)("planning against the target itself yields nothing for $manager", ({ manager, target }) => {
    expect(planManager(manager, target, target)).toEqual([]);
  });
});

describe("buildSourceConfigCommands", () => {
  it("does nothing for a snapshot with no sources or registries", () => {
    expect(buildSourceConfigCommands(makeSnapshot())).toEqual([]);
  });

  it("rewrites apt sources, pins the release, then configures registries", () => {
    const cmds = buildSourceConfigCommands(
      makeSnapshot({
        aptSources: { sourceLines: ["deb http://deb.debian.org/debian bookworm main", " "], pinnedRelease: "bookworm" },
        registries: {
          pipIndexUrl: "https://pypi.example.test/simple",
          pipExtraIndexUrls: ["https://extra.example.test/simple"],
          npmRegistry: "https://registry.example.test/",
          yarnRegistry: "https://registry.example.test/",
          pnpmRegistry: "https://registry.example.test/",
        },
      }),
    );

    expect(cmds).toEqual([
      "cp /etc/apt/sources.list /etc/apt/sources.list.bak 2>/dev/null || true",
      "rm -f /etc/apt/sources.list.d/*.list 2>/dev/null || true",
      "cat > /etc/apt/sources.list <<'DEVBOX_EOF'\ndeb http://deb.debian.org/debian bookworm main\nDEVBOX_EOF",
      `printf '%s\\n' 'APT::Default-Release "bookworm";' > /etc/apt/apt.conf.d/99defaultrelease`,
      "apt-get update",
      "cat > /etc/pip.conf <<'DEVBOX_EOF'\n[global]\nindex-url = https://pypi.example.test/simple\nextra-index-url = https://extra.example.test/simple\nDEVBOX_EOF",
      "npm config set registry https://registry.example.test/ -g",
      "yarn config set npmRegistryServer https://registry.example.test/ -g",
      "pnpm config set registry https://registry.example.test/ -g",
    ]);
  });
});

describe("pip.conf", () => {
  it("writes every extra index URL on a single extra-index-url line", () => {
    const cmds = buildSourceConfigCommands(
      makeSnapshot({
        registries: { pipExtraIndexUrls: ["https://a.example.test/simple", " ", "https://b.example.test/simple"] },
      }),
    );

    expect(cmds).toEqual([
      "cat > /etc/pip.conf <<'DEVBOX_EOF'\n[global]\nextra-index-url = https://a.example.test/simple https://b.example.test/simple\nDEVBOX_EOF",
    ]);
    const keys = cmds[0].split("\n").filter((l) => l.startsWith("extra-index-url"));
    expect(keys).toHaveLength(1);
  });
});

describe("shell helpers", () => {
  it("quotes only when needed", () => {
    expect(shellQuote("curl=7.68.0-1")).toBe("curl=7.68.0-1");
    expect(shellQuote("@scope/pkg@2.0.0")).toBe("@scope/pkg@2.0.0");
    expect(shellQuote("1.2~rc1")).toBe("'1.2~rc1'");
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    expect(shellQuote("")).toBe("''");
  });

  it("picks a here-document delimiter that no line uses", () => {
    expect(heredocWrite("/tmp/x", ["DEVBOX_EOF"])).toBe("cat > /tmp/x <<'DEVBOX_EOF_'\nDEVBOX_EOF\nDEVBOX_EOF_");
  });
});
