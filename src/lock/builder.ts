import { MANAGERS, LOCK_VERSION, type LockSnapshot, type Registries, type SandboxMeta } from "../types/lock.js";
import type { ImageIdentity, SandboxExecutor, SandboxInspection } from "../types/sandbox.js";
import type { PoolOptions } from "../core/worker-pool.js";
import { SandboxUnavailableError, errorMessage } from "../core/errors.js";
import { diag, silentLogger, type Logger } from "../core/diagnostics.js";
import { collectState } from "../collect/state.js";
import type { SourceState } from "../collect/sources.js";
import { writeLockFile } from "./lock-file.js";

export type SnapshotTarget = {
  project: string;
  sandboxId: string;
  baseImage: string;
  setupCommands: string[];
};

export type BuildOptions = {
  pool?: Partial<PoolOptions>;
  logger?: Logger;
  now?: () => Date;
};

/** Start the box if it is stopped. A box that cannot be started is fatal. */
export async function ensureRunning(executor: SandboxExecutor, sandboxId: string, logger: Logger = silentLogger): Promise<void> {
  if (await executor.isRunning(sandboxId)) return;

  logger(diag("info", "SANDBOX_STARTING", `Starting sandbox '${sandboxId}'`));
  await executor.start(sandboxId);

  if (!(await executor.isRunning(sandboxId))) {
    throw new SandboxUnavailableError(sandboxId, "not running after start");
  }
}

/** CPU count with up to three decimals, trailing zeros dropped: 1.5, 2, 0.25. */
export function formatCpus(nanoCpus: number): string {
  return (nanoCpus / 1e9).toFixed(3).replace(/0+$/, "").replace(/\.$/, "");
}

export function formatMemory(bytes: number): string {
  return `${Math.round(bytes / (1024 * 1024))}MB`;
}

function emptyMeta(): SandboxMeta {
  return {
    workingDir: "",
    user: "",
    restartPolicy: "",
    network: "",
    ports: [],
    volumes: [],
    labels: {},
    environment: {},
    capabilities: [],
    resources: {},
  };
}

export function toSandboxMeta(info: SandboxInspection): SandboxMeta {
  const resources: Record<string, string> = {};
  if (info.nanoCpus > 0) resources.cpus = formatCpus(info.nanoCpus);
  if (info.memoryBytes > 0) resources.memory = formatMemory(info.memoryBytes);

  return {
    workingDir: info.workingDir,
    user: info.user,
    restartPolicy: info.restartPolicy,
    network: info.network,
    ports: [...info.ports],
    volumes: [...info.mounts],
    labels: { ...info.labels },
    environment: { ...info.environment },
    capabilities: [...info.capabilities],
    resources,
  };
}

/** Only the registries that were actually found; undefined when none were. */
export function toRegistries(sources: SourceState): Registries | undefined {
  const registries: Registries = {};
  if (sources.pipIndexUrl) registries.pipIndexUrl = sources.pipIndexUrl;
  if (sources.pipExtraIndexUrls.length > 0) registries.pipExtraIndexUrls = [...sources.pipExtraIndexUrls];
  if (sources.npmRegistry) registries.npmRegistry = sources.npmRegistry;
  if (sources.yarnRegistry) registries.yarnRegistry = sources.yarnRegistry;
  if (sources.pnpmRegistry) registries.pnpmRegistry = sources.pnpmRegistry;
  return Object.keys(registries).length > 0 ? registries : undefined;
}

async function tryInspectImage(executor: SandboxExecutor, ref: string, logger: Logger): Promise<ImageIdentity | null> {
  try {
    return await executor.inspectImage(ref);
  } catch (e) {
    logger(diag("warn", "IMAGE_INSPECT_FAILED", `Could not inspect image '${ref}': ${errorMessage(e)}`));
    return null;
  }
}

/**
 * Digest and id of the configured base image. When that image is unknown
 * locally or carries no digest, the image the container runs is used instead.
 */
export async function resolveImageIdentity(
  executor: SandboxExecutor,
  baseImage: string,
  containerImage: string,
  logger: Logger = silentLogger,
): Promise<ImageIdentity> {
  const primary = await tryInspectImage(executor, baseImage, logger);
  if (primary?.digest) return primary;

  if (containerImage && containerImage !== baseImage) {
    const fallback = await tryInspectImage(executor, containerImage, logger);
    if (fallback && (fallback.digest || fallback.id)) return fallback;
  }
  return primary ?? {};
}

async function collectMeta(
  executor: SandboxExecutor,
  target: SnapshotTarget,
  logger: Logger,
): Promise<{ meta: SandboxMeta; image: ImageIdentity }> {
  let info: SandboxInspection | null = null;
  try {
    info = await executor.inspect(target.sandboxId);
  } catch (e) {
    logger(diag("warn", "SANDBOX_INSPECT_FAILED", `Could not inspect sandbox '${target.sandboxId}': ${errorMessage(e)}`));
  }
  const image = await resolveImageIdentity(executor, target.baseImage, info?.image ?? "", logger);
  return { meta: info ? toSandboxMeta(info) : emptyMeta(), image };
}

/** RFC 3339 in UTC, second precision. */
function timestamp(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Capture the box's package, registry and source state plus descriptive
 * metadata. Collection failures degrade to empty values; only an unreachable
 * box is fatal.
 */
export async function buildSnapshot(
  executor: SandboxExecutor,
  target: SnapshotTarget,
  opts: BuildOptions = {},
): Promise<LockSnapshot> {
  const logger = opts.logger ?? silentLogger;

  await ensureRunning(executor, target.sandboxId, logger);

  const [{ packages, sources }, { meta, image }] = await Promise.all([
    collectState(executor, target.sandboxId, { pool: opts.pool, logger }),
    collectMeta(executor, target, logger),
  ]);

  const snapshot: LockSnapshot = {
    version: LOCK_VERSION,
    project: target.project,
    sandboxName: target.sandboxId,
    createdAt: timestamp((opts.now ?? (() => new Date()))()),
    baseImage: {
      name: target.baseImage,
      ...(image.digest ? { digest: image.digest } : {}),
      ...(image.id ? { id: image.id } : {}),
    },
    sandboxMeta: meta,
    packages,
    aptSources: {
      ...(sources.aptSnapshotUrl ? { snapshotUrl: sources.aptSnapshotUrl } : {}),
      sourceLines: sources.aptSourceLines,
      ...(sources.aptRelease ? { pinnedRelease: sources.aptRelease } : {}),
    },
    setupCommands: [...target.setupCommands],
  };

  const registries = toRegistries(sources);
  if (registries) snapshot.registries = registries;

  const counts = MANAGERS.map((m) => `${m}=${packages[m].length}`).join(" ");
  logger(diag("info", "SNAPSHOT_BUILT", `Captured ${target.sandboxId}: ${counts}`));

  return snapshot;
}

/** Build a snapshot and fully replace the lock file at `outputPath`. */
export async function lockSandbox(
  executor: SandboxExecutor,
  target: SnapshotTarget,
  outputPath: string,
  opts: BuildOptions = {},
): Promise<LockSnapshot> {
  const snapshot = await buildSnapshot(executor, target, opts);
  await writeLockFile(outputPath, snapshot);
  (opts.logger ?? silentLogger)(diag("info", "LOCK_WRITTEN", `Wrote ${outputPath}`, { path: outputPath }));
  return snapshot;
}
