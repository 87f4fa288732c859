/** The only way this tool reaches into a box. */
export type ExecResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

/** Read-only container metadata used when building a snapshot. */
export type SandboxInspection = {
  image: string;
  workingDir: string;
  user: string;
  restartPolicy: string;
  network: string;
  ports: string[];
  mounts: string[];
  labels: Record<string, string>;
  environment: Record<string, string>;
  capabilities: string[];
  nanoCpus: number;
  memoryBytes: number;
};

export type ImageIdentity = {
  digest?: string;
  id?: string;
};

export interface SandboxExecutor {
  /** Run a shell command string inside the box. Non-zero exits resolve, they do not reject. */
  execute(sandboxId: string, command: string): Promise<ExecResult>;

  isRunning(sandboxId: string): Promise<boolean>;

  start(sandboxId: string): Promise<void>;

  inspect(sandboxId: string): Promise<SandboxInspection>;

  /** Returns null when the reference cannot be resolved to an image. */
  inspectImage(ref: string): Promise<ImageIdentity | null>;
}
