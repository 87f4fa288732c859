/** Layered configuration: defaults, base.yaml, env overlay, DEVBOX_* variables. */
export type ParallelConfig = {
  enabled: boolean;
  query_workers: number;
  apply_workers: number;
  query_timeout_s: number;
  apply_timeout_s: number;
};

export type DockerConfig = {
  socket_path?: string;
};

export type ProjectEntry = {
  box_name: string;
  workspace_path: string;
  base_image: string;
  setup_commands?: string[];
};

export type DevboxConfig = {
  schema_version: string;
  lock_file: string;
  parallel: ParallelConfig;
  docker?: DockerConfig;
  projects: Record<string, ProjectEntry>;
};
