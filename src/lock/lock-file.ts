import fs from "node:fs/promises";
import path from "node:path";
import { LOCK_VERSION, MANAGERS, type LockSnapshot } from "../types/lock.js";
import { LockFileError, errorMessage } from "../core/errors.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { findDuplicateNames, findUnparseable } from "./package-spec.js";

export const DEFAULT_LOCK_FILE = "devbox.lock.json";

/** `<workspace>/devbox.lock.json` unless the configured name is already absolute. */
export function defaultLockPath(workspacePath: string, lockFile: string = DEFAULT_LOCK_FILE): string {
  return path.isAbsolute(lockFile) ? lockFile : path.join(workspacePath, lockFile);
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

/**
 * Parse and check a lock document: version, schema, then that every package
 * string splits with its manager's separator and names no package twice.
 */
export async function parseLockSnapshot(raw: string, filePath: string, registry?: SchemaRegistry): Promise<LockSnapshot> {
  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (e) {
    throw new LockFileError(`Invalid JSON in lock file ${filePath}: ${errorMessage(e)}`, filePath);
  }

  const version = typeof doc === "object" && doc !== null && "version" in doc ? doc.version : undefined;
  if (version !== LOCK_VERSION) {
    throw new LockFileError(
      `Unsupported lock file version ${JSON.stringify(version ?? null)} in ${filePath} (expected ${LOCK_VERSION})`,
      filePath,
    );
  }

  const reg = registry ?? (await createRegistry());
  const validate = await reg.getValidator<LockSnapshot>("lock");
  if (!validate(doc)) {
    throw new LockFileError(`Lock file ${filePath} does not match schema: ${await reg.errorsText(validate)}`, filePath);
  }

  for (const manager of MANAGERS) {
    const bad = findUnparseable(manager, doc.packages[manager]);
    if (bad.length > 0) {
      throw new LockFileError(`Lock file ${filePath} has unparseable ${manager} entries: ${bad.join(", ")}`, filePath);
    }
    const dupes = findDuplicateNames(manager, doc.packages[manager]);
    if (dupes.length > 0) {
      throw new LockFileError(`Lock file ${filePath} lists ${manager} packages more than once: ${dupes.join(", ")}`, filePath);
    }
  }

  return doc;
}

export async function readLockFile(filePath: string, registry?: SchemaRegistry): Promise<LockSnapshot> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (isErrnoException(e) && e.code === "ENOENT") {
      throw new LockFileError(`Lock file not found: ${filePath}`, filePath);
    }
    throw new LockFileError(`Failed to read lock file ${filePath}: ${errorMessage(e)}`, filePath);
  }
  return parseLockSnapshot(raw, filePath, registry);
}

/** Replace the file at `filePath` with the pretty-printed snapshot. Never appends or patches. */
export async function writeLockFile(filePath: string, snapshot: LockSnapshot): Promise<void> {
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tmp, JSON.stringify(snapshot, null, 2) + "\n", "utf8");
    await fs.rename(tmp, filePath);
  } catch (e) {
    await fs.rm(tmp, { force: true });
    throw new LockFileError(`Failed to write lock file ${filePath}: ${errorMessage(e)}`, filePath);
  }
}
