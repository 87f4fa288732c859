import Docker from "dockerode";
import type { Duplex } from "node:stream";
import type { DockerConfig } from "../types/config.js";
import type { ExecResult, ImageIdentity, SandboxExecutor, SandboxInspection } from "../types/sandbox.js";
import { SandboxUnavailableError, errorMessage } from "../core/errors.js";

/** Sourced before every command so managers installed through shell init are on PATH. */
export const SHELL_PREFIX = ". /root/.bashrc >/dev/null 2>&1 || true; set -o pipefail; ";

const STDOUT = 1;
const STDERR = 2;
const HEADER_BYTES = 8;

function statusCode(e: unknown): number | undefined {
  if (typeof e === "object" && e !== null && "statusCode" in e && typeof e.statusCode === "number") {
    return e.statusCode;
  }
  return undefined;
}

/**
 * Split Docker's multiplexed exec stream. Each frame is an 8-byte header
 * (stream type, 3 reserved bytes, big-endian payload size) and its payload.
 * Frames may straddle chunk boundaries.
 */
export function createDemuxer(): { push(chunk: Buffer): void; stdout(): string; stderr(): string } {
  let pending: Buffer = Buffer.alloc(0);
  const out: Buffer[] = [];
  const err: Buffer[] = [];

  return {
    push(chunk) {
      pending = pending.length === 0 ? chunk : Buffer.concat([pending, chunk]);
      while (pending.length >= HEADER_BYTES) {
        const size = pending.readUInt32BE(4);
        if (pending.length < HEADER_BYTES + size) break;
        const payload = pending.subarray(HEADER_BYTES, HEADER_BYTES + size);
        if (pending[0] === STDOUT) out.push(payload);
        else if (pending[0] === STDERR) err.push(payload);
        pending = pending.subarray(HEADER_BYTES + size);
      }
    },
    stdout: () => Buffer.concat(out).toString("utf8"),
    stderr: () => Buffer.concat(err).toString("utf8"),
  };
}

function drain(stream: Duplex): Promise<{ stdout: string; stderr: string }> {
  const demux = createDemuxer();
  return new Promise((resolve, reject) => {
    stream.on("data", (chunk: Buffer) => demux.push(chunk));
    stream.on("end", () => resolve({ stdout: demux.stdout(), stderr: demux.stderr() }));
    stream.on("error", reject);
  });
}

/** SandboxExecutor backed by the Docker Engine API. Sandbox ids are container names or ids. */
export class DockerSandboxExecutor implements SandboxExecutor {
  private readonly docker: Docker;

  constructor(config: DockerConfig = {}) {
    this.docker = config.socket_path ? new Docker({ socketPath: config.socket_path }) : new Docker();
  }

  private async inspectContainer(sandboxId: string): Promise<Docker.ContainerInspectInfo> {
    try {
      return await this.docker.getContainer(sandboxId).inspect();
    } catch (e) {
      if (statusCode(e) === 404) {
        throw new SandboxUnavailableError(sandboxId, "container does not exist");
      }
      throw new SandboxUnavailableError(sandboxId, errorMessage(e));
    }
  }

  async execute(sandboxId: string, command: string): Promise<ExecResult> {
    const container = this.docker.getContainer(sandboxId);
    let exec: Docker.Exec;
    try {
      exec = await container.exec({
        Cmd: ["bash", "-lc", SHELL_PREFIX + command],
        AttachStdout: true,
        AttachStderr: true,
      });
    } catch (e) {
      throw new SandboxUnavailableError(sandboxId, statusCode(e) === 404 ? "container does not exist" : errorMessage(e));
    }

    const stream = await exec.start({ hijack: true, stdin: false });
    const { stdout, stderr } = await drain(stream);
    const info = await exec.inspect();

    return { stdout, stderr, exitCode: info.ExitCode ?? -1 };
  }

  async isRunning(sandboxId: string): Promise<boolean> {
    const info = await this.inspectContainer(sandboxId);
    return info.State.Running;
  }

  async start(sandboxId: string): Promise<void> {
    try {
      await this.docker.getContainer(sandboxId).start();
    } catch (e) {
      // 304: already running
      if (statusCode(e) === 304) return;
      throw new SandboxUnavailableError(sandboxId, `failed to start: ${errorMessage(e)}`);
    }
  }

  async inspect(sandboxId: string): Promise<SandboxInspection> {
    const info = await this.inspectContainer(sandboxId);

    const environment: Record<string, string> = {};
    for (const entry of info.Config.Env ?? []) {
      const eq = entry.indexOf("=");
      if (eq > 0) environment[entry.slice(0, eq)] = entry.slice(eq + 1);
    }

    const ports: string[] = [];
    for (const [containerPort, bindings] of Object.entries(info.NetworkSettings.Ports ?? {})) {
      for (const b of bindings ?? []) {
        ports.push(`${containerPort} -> ${b.HostIp}:${b.HostPort}`);
      }
    }

    return {
      image: info.Image,
      workingDir: info.Config.WorkingDir ?? "",
      user: info.Config.User ?? "",
      restartPolicy: info.HostConfig.RestartPolicy?.Name ?? "",
      network: info.HostConfig.NetworkMode ?? "",
      ports,
      mounts: info.Mounts.map((m) => `${m.Type} ${m.Source} -> ${m.Destination} (rw=${String(m.RW)})`),
      labels: { ...(info.Config.Labels ?? {}) },
      environment,
      capabilities: [...(info.HostConfig.CapAdd ?? [])],
      nanoCpus: info.HostConfig.NanoCpus ?? 0,
      memoryBytes: info.HostConfig.Memory ?? 0,
    };
  }

  async inspectImage(ref: string): Promise<ImageIdentity | null> {
    try {
      const info = await this.docker.getImage(ref).inspect();
      const digest = info.RepoDigests?.[0]?.trim();
      return { digest: digest || undefined, id: info.Id || undefined };
    } catch (e) {
      if (statusCode(e) === 404) return null;
      throw e;
    }
  }
}
