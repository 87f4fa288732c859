import { describe, expect, it, beforeAll } from "vitest";
import path from "node:path";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import { makeSnapshot } from "./fixtures/snapshots.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  const check = async (data: unknown) => {
    const validate = await registry.getValidator("lock");
    const valid = validate(data);
    return { valid, errors: valid ? null : await registry.errorsText(validate) };
  };

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("discovers all schema files", () => {
    expect(registry.names()).toEqual(["config", "lock"]);
  });

  it("fails to load a missing directory", async () => {
    await expect(createRegistry(path.join(SCHEMA_DIR, "nope"))).rejects.toThrow(/Schema directory not found/);
  });

  it("names the available schemas for an unknown name", async () => {
    await expect(registry.getValidator("freeze")).rejects.toThrow("Schema not found: freeze (available: config, lock)");
  });

  describe("lock schema", () => {
    it("accepts a minimal snapshot", async () => {
      expect(await check(makeSnapshot())).toEqual({ valid: true, errors: null });
    });

    it("accepts optional registries and apt source fields", async () => {
      const { valid } = await check(
        makeSnapshot({
          baseImage: { name: "debian:12", digest: "debian@sha256:0000", id: "sha256:1111" },
          registries: { pipIndexUrl: "https://pypi.example.test/simple", pipExtraIndexUrls: [] },
          aptSources: { snapshotUrl: "https://snapshot.debian.org/archive/debian/20240101T000000Z", sourceLines: [], pinnedRelease: "bookworm" },
        }),
      );
      expect(valid).toBe(true);
    });

    it("rejects an unknown manager key", async () => {
      const snapshot = { ...makeSnapshot(), packages: { ...makeSnapshot().packages, brew: [] } };
      const { valid, errors } = await check(snapshot);
      expect(valid).toBe(false);
      expect(errors).toContain("must NOT have additional properties");
    });

    it("rejects a malformed timestamp", async () => {
      const { valid, errors } = await check(makeSnapshot({ createdAt: "yesterday" }));
      expect(valid).toBe(false);
      expect(errors).toContain('must match format "date-time"');
    });
  });
});
