import path from "node:path";
import type { LockSnapshot } from "../types/lock.js";
import { LockFileError } from "../core/errors.js";
import { diag, type Diagnostic } from "../core/diagnostics.js";
import { readLockFile } from "../lock/lock-file.js";
import { createRegistry } from "../schema/registry.js";
import { EXIT } from "./exit-codes.js";

export type ValidateResult =
  | { ok: true; snapshot: LockSnapshot }
  | { ok: false; errors: Diagnostic[]; exitCode: number };

/** Check a lock file's version, schema and package strings without touching a sandbox. */
export async function validateLock(opts: { file: string; schemaDir?: string }): Promise<ValidateResult> {
  const filePath = path.resolve(opts.file);
  const registry = await createRegistry(opts.schemaDir);

  try {
    return { ok: true, snapshot: await readLockFile(filePath, registry) };
  } catch (e) {
    if (!(e instanceof LockFileError)) throw e;
    return {
      ok: false,
      errors: [diag("error", e.code, e.message, { path: filePath })],
      exitCode: EXIT.LOCK_FILE_ERROR,
    };
  }
}
