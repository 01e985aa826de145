import { z } from "zod";
import type {
  ContainerInfo,
  ContainerSpec,
  ContainerState,
  ExecResult,
} from "../types/docker.ts";
import {
  ContainerStartError,
  DockerError,
  DockerNotInstalledError,
  DockerNotRunningError,
  DockerPermissionError,
} from "../types/errors.ts";
import { COMMAND_NOT_FOUND, type CommandRunner, getCommandRunner } from "./command-runner.ts";

/**
 * Operations the provisioner needs from a container runtime
 */
export interface ContainerRuntime {
  isInstalled(): Promise<boolean>;
  checkPermissions(): Promise<boolean>;
  networkExists(name: string): Promise<boolean>;
  createNetwork(name: string): Promise<void>;
  removeNetwork(name: string): Promise<void>;
  getContainer(nameOrId: string): Promise<ContainerInfo | null>;
  containerExists(name: string): Promise<boolean>;
  isContainerRunning(name: string): Promise<boolean>;
  listContainers(options?: ListContainersOptions): Promise<ContainerInfo[]>;
  runContainer(spec: ContainerSpec): Promise<string>;
  startContainer(name: string): Promise<void>;
  stopContainer(name: string): Promise<void>;
  removeContainer(name: string, options?: { force?: boolean }): Promise<void>;
  exec(name: string, command: string[]): Promise<ExecResult>;
  logs(name: string, options?: LogsOptions): Promise<void>;
}

export interface ListContainersOptions {
  all?: boolean;
  /** Exact container names to match */
  names?: string[];
}

export interface LogsOptions {
  follow?: boolean;
  tail?: number;
}

const CONTAINER_STATES: readonly ContainerState[] = [
  "created",
  "running",
  "paused",
  "restarting",
  "removing",
  "exited",
  "dead",
];

function toContainerState(value: string): ContainerState {
  const normalized = value.toLowerCase();
  return CONTAINER_STATES.find((state) => state === normalized) ?? "unknown";
}

/** One line of `docker ps --format '{{json .}}'` */
const PsLineSchema = z.object({
  ID: z.string().default(""),
  Names: z.string().default(""),
  Image: z.string().default(""),
  State: z.string().default("unknown"),
  Status: z.string().default(""),
  Networks: z.string().default(""),
});

/** The fields we read from `docker inspect` */
const InspectSchema = z.object({
  Id: z.string().default(""),
  Name: z.string().default(""),
  State: z
    .object({
      Status: z.string().default("unknown"),
      Running: z.boolean().default(false),
    })
    .default({}),
  Config: z.object({ Image: z.string().default("") }).default({}),
  NetworkSettings: z
    .object({ Networks: z.record(z.unknown()).nullable().default({}) })
    .default({}),
});

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Build the argument list for `docker run` (without the leading "docker")
 */
export function buildRunArgs(spec: ContainerSpec): string[] {
  const args = ["run", "-d", "--name", spec.name, "--network", spec.network];

  for (const volume of spec.volumes) {
    args.push("-v", `${volume.host}:${volume.container}`);
  }
  for (const port of spec.ports) {
    args.push("-p", `${port.host}:${port.container}`);
  }
  for (const [key, value] of Object.entries(spec.env)) {
    args.push("-e", `${key}=${value}`);
  }
  if (spec.entrypoint) {
    args.push(`--entrypoint=${spec.entrypoint}`);
  }

  args.push(spec.image);
  return args;
}

/**
 * Docker client using CLI commands
 */
export class DockerClient implements ContainerRuntime {
  constructor(private runner: CommandRunner = getCommandRunner()) {}

  private docker(args: string[]): Promise<ExecResult> {
    return this.runner.run("docker", args);
  }

  /**
   * Check if the docker binary is on PATH
   */
  async isInstalled(): Promise<boolean> {
    const result = await this.docker(["--version"]);
    return result.exitCode !== COMMAND_NOT_FOUND;
  }

  /**
   * Check if user has Docker permissions
   * @throws DockerNotInstalledError if the binary is missing
   * @throws DockerNotRunningError if daemon is not running
   * @throws DockerPermissionError if permission denied
   */
  async checkPermissions(): Promise<boolean> {
    const result = await this.docker(["info"]);
    if (result.exitCode === 0) {
      return true;
    }
    if (result.exitCode === COMMAND_NOT_FOUND) {
      throw new DockerNotInstalledError();
    }

    const message = result.stderr.toLowerCase();
    if (message.includes("permission denied")) {
      throw new DockerPermissionError();
    }
    if (message.includes("cannot connect") || message.includes("is the docker daemon running")) {
      throw new DockerNotRunningError();
    }
    throw new DockerError(`Docker error: ${result.stderr.trim()}`);
  }

  async networkExists(name: string): Promise<boolean> {
    const result = await this.docker(["network", "inspect", name]);
    return result.exitCode === 0;
  }

  async createNetwork(name: string): Promise<void> {
    const result = await this.docker(["network", "create", name]);
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to create network '${name}': ${result.stderr.trim()}`);
    }
  }

  async removeNetwork(name: string): Promise<void> {
    const result = await this.docker(["network", "rm", name]);
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to remove network '${name}': ${result.stderr.trim()}`);
    }
  }

  /**
   * Get a single container by name or ID
   */
  async getContainer(nameOrId: string): Promise<ContainerInfo | null> {
    const result = await this.docker(["inspect", "--type", "container", "--format", "json", nameOrId]);
    if (result.exitCode !== 0) {
      return null;
    }

    const data = parseJson(result.stdout);
    if (!Array.isArray(data) || data.length === 0) {
      return null;
    }

    const parsed = InspectSchema.safeParse(data[0]);
    if (!parsed.success) {
      return null;
    }
    const inspect = parsed.data;
    const state = toContainerState(inspect.State.Status);

    return {
      id: inspect.Id.substring(0, 12),
      name: inspect.Name.replace(/^\//, ""),
      image: inspect.Config.Image,
      running: inspect.State.Running,
      state,
      status: state,
      networks: Object.keys(inspect.NetworkSettings.Networks ?? {}),
    };
  }

  async containerExists(name: string): Promise<boolean> {
    return (await this.getContainer(name)) !== null;
  }

  async isContainerRunning(name: string): Promise<boolean> {
    const container = await this.getContainer(name);
    return container?.running ?? false;
  }

  /**
   * List containers, optionally limited to exact names
   */
  async listContainers(options?: ListContainersOptions): Promise<ContainerInfo[]> {
    const args = ["ps", "--format", "{{json .}}"];
    if (options?.all) {
      args.push("-a");
    }
    for (const name of options?.names ?? []) {
      args.push("--filter", `name=^${name}$`);
    }

    const result = await this.docker(args);
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to list containers: ${result.stderr.trim()}`);
    }

    const containers: ContainerInfo[] = [];
    for (const line of result.stdout.split("\n")) {
      if (!line.trim()) continue;

      const parsed = PsLineSchema.safeParse(parseJson(line));
      if (!parsed.success) continue;

      const row = parsed.data;
      const state = toContainerState(row.State);
      containers.push({
        id: row.ID.substring(0, 12),
        name: row.Names,
        image: row.Image,
        running: state === "running",
        state,
        status: row.Status,
        networks: row.Networks ? row.Networks.split(",") : [],
      });
    }

    return containers;
  }

  /**
   * Create and start a detached container
   * @returns the new container's ID
   */
  async runContainer(spec: ContainerSpec): Promise<string> {
    const result = await this.docker(buildRunArgs(spec));
    if (result.exitCode !== 0) {
      throw new ContainerStartError(spec.name, result.stderr.trim() || `exit code ${result.exitCode}`);
    }
    return result.stdout.trim();
  }

  async startContainer(name: string): Promise<void> {
    const result = await this.docker(["start", name]);
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to start container '${name}': ${result.stderr.trim()}`);
    }
  }

  async stopContainer(name: string): Promise<void> {
    const result = await this.docker(["stop", name]);
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to stop container '${name}': ${result.stderr.trim()}`);
    }
  }

  /**
   * Remove a container by name or ID
   */
  async removeContainer(name: string, options?: { force?: boolean }): Promise<void> {
    const args = ["rm"];
    if (options?.force) {
      args.push("-f");
    }
    args.push(name);

    const result = await this.docker(args);
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to remove container '${name}': ${result.stderr.trim()}`);
    }
  }

  /**
   * Run a command inside a running container
   */
  exec(name: string, command: string[]): Promise<ExecResult> {
    return this.docker(["exec", name, ...command]);
  }

  /**
   * Stream container logs to the terminal
   */
  async logs(name: string, options?: LogsOptions): Promise<void> {
    const args = ["logs"];
    if (options?.follow) {
      args.push("-f");
    }
    if (options?.tail !== undefined) {
      args.push("--tail", String(options.tail));
    }
    args.push(name);

    const result = await this.runner.run("docker", args, { inherit: true });
    if (result.exitCode !== 0) {
      throw new DockerError(`Failed to read logs for '${name}'`);
    }
  }
}

// Default singleton instance
let defaultInstance: DockerClient | null = null;

/**
 * Get the default DockerClient instance
 */
export function getDockerClient(): DockerClient {
  if (defaultInstance === null) {
    defaultInstance = new DockerClient();
  }
  return defaultInstance;
}
