import { describe, expect, it } from "vitest";
import {
  contentLines,
  parseAptOutput,
  parseNpmOutput,
  parsePipOutput,
  parsePnpmOutput,
  parseYarnOutput,
} from "../src/collect/parsers.js";
import { parseAptSources, parsePipConfig, parseRegistryValue } from "../src/collect/sources.js";

const names = (recs: Array<{ name: string; version: string }>) => recs.map((r) => `${r.name} ${r.version}`);

describe("contentLines", () => {
  it("drops blank and comment lines and trims the rest", () => {
    expect(contentLines("  a \n\n# note\n\tb\r\n")).toEqual(["a", "b"]);
  });
});

describe("package parsers", () => {
  it("apt reads name=version lines", () => {
    expect(names(parseAptOutput("curl=7.68.0-1\ngit=1:2.34.1-1ubuntu1\n"))).toEqual(["curl 7.68.0-1", "git 1:2.34.1-1ubuntu1"]);
  });

  it("pip keeps pinned lines and drops direct references", () => {
    const out = "# comment\nrequests==2.28.0\n-e git+https://example.test/x.git#egg=x\nurllib3==1.26.0\n";
    expect(names(parsePipOutput(out))).toEqual(["requests 2.28.0", "urllib3 1.26.0"]);
  });

  it("npm prefers the JSON dependency map", () => {
    const out = JSON.stringify({
      name: "lib",
      dependencies: { typescript: { version: "5.0.0" }, "@scope/cli": { version: "1.2.3" }, broken: {} },
    });
    expect(names(parseNpmOutput(out))).toEqual(["typescript 5.0.0", "@scope/cli 1.2.3"]);
  });

  it("npm falls back to name@version lines", () => {
    expect(names(parseNpmOutput("typescript@5.0.0\n@scope/cli@1.2.3\n"))).toEqual(["typescript 5.0.0", "@scope/cli 1.2.3"]);
  });

  it("npm with no global packages yields nothing", () => {
    expect(parseNpmOutput('{"name":"lib"}')).toEqual([]);
    expect(parseNpmOutput("")).toEqual([]);
  });

  it("pnpm reads the array form", () => {
    const out = JSON.stringify([{ path: "/g", dependencies: { prettier: { version: "3.1.0" } } }]);
    expect(names(parsePnpmOutput(out))).toEqual(["prettier 3.1.0"]);
  });

  it("pnpm falls back to lines", () => {
    expect(names(parsePnpmOutput("prettier@3.1.0\n"))).toEqual(["prettier 3.1.0"]);
  });

  it("yarn strips tree drawing and trailing notes", () => {
    const out = ["├── eslint@8.57.0", "└── @scope/tool@0.4.1 (2 binaries)", "│  └─ nested@1.0.0"].join("\n");
    expect(names(parseYarnOutput(out))).toEqual(["eslint 8.57.0", "@scope/tool 0.4.1", "nested 1.0.0"]);
  });

  it("yarn reads the classic global list format", () => {
    const out = [
      "yarn global v1.22.19",
      'info "typescript@5.0.0" has binaries:',
      "   - tsc",
      "   - tsserver",
      "Done in 0.05s.",
    ].join("\n");
    expect(names(parseYarnOutput(out))).toEqual(["typescript 5.0.0"]);
  });
});

describe("source parsers", () => {
  it("finds a snapshot archive URL among apt source lines", () => {
    const out = [
      "# generated",
      "deb http://archive.ubuntu.com/ubuntu jammy main",
      "deb [check-valid-until=no] https://snapshot.ubuntu.com/ubuntu/20240301T000000Z jammy main",
      "",
    ].join("\n");
    const res = parseAptSources(out);
    expect(res.lines).toHaveLength(2);
    expect(res.snapshotUrl).toBe("https://snapshot.ubuntu.com/ubuntu/20240301T000000Z");
  });

  it("reports no snapshot URL for ordinary mirrors", () => {
    expect(parseAptSources("deb http://deb.debian.org/debian bookworm main\n").snapshotUrl).toBe("");
  });

  it("reads pip config list output and raw pip.conf lines", () => {
    const out = [
      "global.index-url='https://pypi.example.test/simple'",
      "global.extra-index-url='https://a.example.test/simple https://b.example.test/simple'",
      "index-url = https://ignored.example.test/simple",
      "extra-index-url = https://a.example.test/simple",
    ].join("\n");
    expect(parsePipConfig(out)).toEqual({
      indexUrl: "https://pypi.example.test/simple",
      extraIndexUrls: ["https://a.example.test/simple", "https://b.example.test/simple"],
    });
  });

  it("treats undefined and null registry output as unset", () => {
    expect(parseRegistryValue("undefined\n")).toBe("");
    expect(parseRegistryValue("null")).toBe("");
    expect(parseRegistryValue(" https://registry.npmjs.org/ \n")).toBe("https://registry.npmjs.org/");
  });
});
