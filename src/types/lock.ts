/** Lock snapshot: captured package, registry and source state of a box. */
export const MANAGERS = ["apt", "pip", "npm", "yarn", "pnpm"] as const;

export type Manager = (typeof MANAGERS)[number];

export type PackageRecord = {
  manager: Manager;
  name: string;
  version: string;
};

/** Manager → ordered `name<sep>version` strings. */
export type PackageLists = Record<Manager, string[]>;

export type BaseImage = {
  name: string;
  digest?: string;
  id?: string;
};

export type SandboxMeta = {
  workingDir: string;
  user: string;
  restartPolicy: string;
  network: string;
  ports: string[];
  volumes: string[];
  labels: Record<string, string>;
  environment: Record<string, string>;
  capabilities: string[];
  resources: Record<string, string>;
};

export type Registries = {
  pipIndexUrl?: string;
  pipExtraIndexUrls?: string[];
  npmRegistry?: string;
  yarnRegistry?: string;
  pnpmRegistry?: string;
};

export type AptSources = {
  snapshotUrl?: string;
  sourceLines: string[];
  pinnedRelease?: string;
};

export const LOCK_VERSION = 1;

export type LockSnapshot = {
  version: typeof LOCK_VERSION;
  project: string;
  sandboxName: string;
  createdAt: string;
  baseImage: BaseImage;
  sandboxMeta: SandboxMeta;
  packages: PackageLists;
  registries?: Registries;
  aptSources: AptSources;
  setupCommands: string[];
};
