import { describe, expect, it } from "vitest";
import {
  findDuplicateNames,
  findUnparseable,
  formatPackageSpec,
  parsePackageSpec,
  toVersionMap,
} from "../src/lock/package-spec.js";

describe("parsePackageSpec", () => {
  it("splits node specs on the last @", () => {
    expect(parsePackageSpec("npm", "left-pad@1.3.2")).toEqual({ manager: "npm", name: "left-pad", version: "1.3.2" });
    expect(parsePackageSpec("pnpm", "@scope/pkg@2.0.0")).toEqual({ manager: "pnpm", name: "@scope/pkg", version: "2.0.0" });
  });

  it("splits apt on = and pip on ==", () => {
    expect(parsePackageSpec("apt", "curl=7.68.0-1")).toEqual({ manager: "apt", name: "curl", version: "7.68.0-1" });
    expect(parsePackageSpec("apt", "libc6=2.35-0ubuntu3.1")?.version).toBe("2.35-0ubuntu3.1");
    expect(parsePackageSpec("pip", "requests==2.28.0")).toEqual({ manager: "pip", name: "requests", version: "2.28.0" });
  });

  it("trims surrounding whitespace", () => {
    expect(parsePackageSpec("pip", "  flask==3.0.0 \n")).toEqual({ manager: "pip", name: "flask", version: "3.0.0" });
  });

  it("rejects blank, versionless and nameless input", () => {
    expect(parsePackageSpec("npm", "")).toBeNull();
    expect(parsePackageSpec("npm", "@scope/pkg")).toBeNull();
    expect(parsePackageSpec("npm", "typescript@")).toBeNull();
    expect(parsePackageSpec("pip", "-e git+https://example.test/repo.git#egg=thing")).toBeNull();
    expect(parsePackageSpec("apt", "=1.0")).toBeNull();
  });
});

describe("formatPackageSpec", () => {
  it("uses the manager's separator", () => {
    expect(formatPackageSpec({ manager: "pip", name: "requests", version: "2.28.0" })).toBe("requests==2.28.0");
    expect(formatPackageSpec({ manager: "yarn", name: "@scope/pkg", version: "1.0.0" })).toBe("@scope/pkg@1.0.0");
  });
});

describe("toVersionMap", () => {
  it("keys by lower-cased name and keeps the first occurrence", () => {
    const map = toVersionMap("pip", ["Flask==3.0.0", "flask==2.0.0", "bogus"]);
    expect([...map.keys()]).toEqual(["flask"]);
    expect(map.get("flask")).toEqual({ manager: "pip", name: "Flask", version: "3.0.0" });
  });
});

describe("findUnparseable", () => {
  it("lists entries that do not split, ignoring blanks", () => {
    expect(findUnparseable("apt", ["curl=1", "", "git"])).toEqual(["git"]);
    expect(findUnparseable("npm", ["@scope/pkg@1.0.0"])).toEqual([]);
  });
});

describe("findDuplicateNames", () => {
  it("reports each repeated name once, in its first spelling", () => {
    expect(findDuplicateNames("pip", ["Flask==3.0.0", "flask==2.0.0", "FLASK==1.0.0", "requests==2.28.0"])).toEqual(["Flask"]);
  });

  it("is empty when every name is distinct", () => {
    expect(findDuplicateNames("npm", ["@scope/pkg@1.0.0", "pkg@1.0.0", "not a spec"])).toEqual([]);
  });
});
