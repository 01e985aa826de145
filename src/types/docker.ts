/**
 * Docker-related type definitions
 */

export type ContainerState =
  | "created"
  | "running"
  | "paused"
  | "restarting"
  | "removing"
  | "exited"
  | "dead"
  | "unknown";

/**
 * Container status information
 */
export interface ContainerInfo {
  /** Container ID (short form) */
  id: string;

  /** Container name (without leading slash) */
  name: string;

  /** Image name with tag */
  image: string;

  /** Whether container is running */
  running: boolean;

  state: ContainerState;

  /** Human readable status, e.g. "Up 3 minutes" */
  status: string;

  /** Networks container is attached to */
  networks: string[];
}

export interface PortMapping {
  host: number;
  container: number;
}

export interface VolumeMount {
  /** Absolute host path */
  host: string;
  container: string;
}

/**
 * Everything needed to `docker run` one container
 */
export interface ContainerSpec {
  name: string;
  image: string;
  network: string;
  ports: PortMapping[];
  env: Record<string, string>;
  volumes: VolumeMount[];
  /** Overrides the image's entrypoint */
  entrypoint?: string;
}

/**
 * Result of an external command
 */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}
