/**
 * Provisioner - brings up a local Faraday installation
 *
 * Runs ten stages in a fixed order. Only a missing or unreachable Docker,
 * a container that fails to launch, and a database or cache that never
 * becomes ready abort the run; every other problem is recorded as a warning
 * and the run continues to the summary.
 */

import { type Config, getAppUrl, getRequiredPorts } from "../types/config.ts";
import type { ContainerInfo, ContainerSpec } from "../types/docker.ts";
import { DockerNotInstalledError, ReadinessTimeoutError } from "../types/errors.ts";
import { logger as defaultLogger, type ProvisionLogger } from "../utils/logger.ts";
import { resolvePath } from "../utils/paths.ts";
import { createDirectoryRemover, type DirectoryRemover, pathExists } from "./data-dir.ts";
import { type ContainerRuntime, getDockerClient } from "./docker-client.ts";
import { isPortInUse as defaultPortChecker, type PortChecker } from "./port-checker.ts";
import {
  type Clock,
  type HttpProbe,
  probeHttp as defaultHttpProbe,
  systemClock,
  waitUntil,
} from "./readiness.ts";
import { renderSummary } from "./summary.ts";
import { buildTopology, changePasswordCommand, stopOrder, type Topology } from "./topology.ts";

// =============================================================================
// Types
// =============================================================================

export const STAGES = [
  "check_docker",
  "check_ports",
  "cleanup",
  "create_network",
  "start_postgres",
  "start_redis",
  "start_app",
  "setup_password",
  "verify",
  "summary",
] as const;

export type Stage = (typeof STAGES)[number];
export type StageStatus = "ok" | "warning" | "failed";

export interface StageOutcome {
  stage: Stage;
  status: StageStatus;
}

export interface ProvisionReport {
  stages: StageOutcome[];
  warnings: string[];
  /** False when the application container was not running at verification */
  verified: boolean;
  summary: string[];
}

export interface ProvisionerDeps {
  config: Config;
  docker?: ContainerRuntime;
  isPortInUse?: PortChecker;
  probeHttp?: HttpProbe;
  removeDir?: DirectoryRemover;
  clock?: Clock;
  logger?: ProvisionLogger;
}

export interface TeardownOptions {
  /** Leave the mounted data directory in place */
  keepData?: boolean;
}

export const PASSWORD_WARNING = "Could not set password. You may need to set it manually.";
export const WEB_NOT_READY_WARNING =
  "Web interface might not be ready yet. Please wait a few minutes.";

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// Provisioner
// =============================================================================

export class Provisioner {
  private readonly config: Config;
  private readonly topology: Topology;
  private readonly docker: ContainerRuntime;
  private readonly portInUse: PortChecker;
  private readonly httpProbe: HttpProbe;
  private readonly removeDir: DirectoryRemover;
  private readonly clock: Clock;
  private readonly logger: ProvisionLogger;

  private outcomes: StageOutcome[] = [];
  private warnings: string[] = [];
  private verified = false;
  private summary: string[] = [];

  constructor(deps: ProvisionerDeps) {
    this.config = deps.config;
    this.topology = buildTopology(deps.config);
    this.docker = deps.docker ?? getDockerClient();
    this.portInUse = deps.isPortInUse ?? defaultPortChecker;
    this.httpProbe = deps.probeHttp ?? defaultHttpProbe;
    this.removeDir = deps.removeDir ?? createDirectoryRemover(deps.config.cleanup.use_sudo);
    this.clock = deps.clock ?? systemClock;
    this.logger = deps.logger ?? defaultLogger;
  }

  /**
   * Run every stage in order
   * @throws DockerError when Docker is unusable or a container cannot launch
   * @throws ReadinessTimeoutError when the database or cache never comes up
   */
  async run(): Promise<ProvisionReport> {
    this.reset();

    const handlers: Record<Stage, () => Promise<void>> = {
      check_docker: () => this.checkDocker(),
      check_ports: () => this.checkPorts(),
      cleanup: () => this.cleanup(false),
      create_network: () => this.createNetwork(),
      start_postgres: () => this.startPostgres(),
      start_redis: () => this.startRedis(),
      start_app: () => this.startApp(),
      setup_password: () => this.setupPassword(),
      verify: () => this.verify(),
      summary: () => this.showSummary(),
    };

    for (const stage of STAGES) {
      await this.runStage(stage, handlers[stage]);
    }

    return this.report();
  }

  /**
   * Remove containers, network and (optionally) the data directory
   * @returns warnings raised while cleaning up
   */
  async teardown(options: TeardownOptions = {}): Promise<string[]> {
    this.reset();
    await this.runStage("check_docker", () => this.checkDocker());
    await this.runStage("cleanup", () => this.cleanup(options.keepData ?? false));
    return [...this.warnings];
  }

  // ===========================================================================
  // Stages
  // ===========================================================================

  private async checkDocker(): Promise<void> {
    this.logger.info("Checking Docker installation...");
    if (!(await this.docker.isInstalled())) {
      throw new DockerNotInstalledError();
    }
    await this.docker.checkPermissions();
    this.logger.success("Docker is installed and running.");
  }

  private async checkPorts(): Promise<void> {
    this.logger.info("Checking if required ports are available...");
    for (const port of getRequiredPorts(this.config)) {
      if (await this.portInUse(port)) {
        this.warn(`Port ${port} is already in use. This might cause issues.`);
      }
    }
  }

  private async cleanup(keepData: boolean): Promise<void> {
    this.logger.info("Cleaning up existing containers...");

    for (const name of stopOrder(this.config)) {
      try {
        const container = await this.docker.getContainer(name);
        if (!container) {
          this.logger.debug(`Container ${name} not present`);
          continue;
        }
        if (container.running) {
          // rm --force below kills it if the graceful stop fails
          try {
            await this.docker.stopContainer(name);
          } catch (error) {
            this.logger.debug(`Could not stop container ${name}: ${describe(error)}`);
          }
        }
        await this.docker.removeContainer(name, { force: true });
        this.logger.info(`Removed container ${name}`);
      } catch (error) {
        this.warn(`Could not remove container ${name}: ${describe(error)}`);
      }
    }

    const { network } = this.topology;
    try {
      if (await this.docker.networkExists(network)) {
        await this.docker.removeNetwork(network);
        this.logger.info(`Removed network ${network}`);
      }
    } catch (error) {
      this.warn(`Could not remove network ${network}: ${describe(error)}`);
    }

    if (keepData) {
      return;
    }

    const dataDir = resolvePath(this.config.data_dir);
    try {
      if (await pathExists(dataDir)) {
        this.logger.info("Removing old configuration...");
        await this.removeDir(dataDir);
      }
    } catch (error) {
      this.warn(`Could not remove ${dataDir}: ${describe(error)}`);
    }
  }

  private async createNetwork(): Promise<void> {
    const { network } = this.topology;
    this.logger.info("Creating Docker network...");

    if (await this.docker.networkExists(network)) {
      this.warn(`Network ${network} already exists; reusing it.`);
      return;
    }
    await this.docker.createNetwork(network);
  }

  private async startPostgres(): Promise<void> {
    const spec = this.topology.postgres;
    const { user, name } = this.config.database;

    this.logger.info("Starting PostgreSQL database...");
    await this.launch(spec);

    // TCP rather than the socket: the image's init server listens on the socket only
    this.logger.info("Waiting for PostgreSQL to be ready...");
    await this.waitForService("PostgreSQL", this.config.readiness.postgres_timeout_ms, async () => {
      const result = await this.docker.exec(spec.name, [
        "pg_isready",
        "-h",
        "127.0.0.1",
        "-U",
        user,
        "-d",
        name,
      ]);
      return result.exitCode === 0;
    });
  }

  private async startRedis(): Promise<void> {
    const spec = this.topology.redis;

    this.logger.info("Starting Redis cache...");
    await this.launch(spec);

    await this.waitForService("Redis", this.config.readiness.redis_timeout_ms, async () => {
      const result = await this.docker.exec(spec.name, ["redis-cli", "ping"]);
      return result.exitCode === 0 && result.stdout.trim() === "PONG";
    });
  }

  private async startApp(): Promise<void> {
    const timeoutMs = this.config.readiness.app_timeout_ms;

    this.logger.info("Starting Faraday application...");
    await this.launch(this.topology.app);

    this.logger.info("Waiting for Faraday to initialize...");
    const ready = await waitUntil(async () => (await this.httpProbe(getAppUrl(this.config))) === 200, {
      timeoutMs,
      intervalMs: this.config.readiness.interval_ms,
      clock: this.clock,
    });

    if (!ready) {
      this.warn(`Faraday did not answer within ${Math.round(timeoutMs / 1000)}s; continuing.`);
    }
  }

  private async setupPassword(): Promise<void> {
    const { username, password } = this.config.admin;
    this.logger.info("Setting up default password...");

    try {
      const result = await this.docker.exec(
        this.config.containers.app,
        changePasswordCommand(username, password),
      );
      if (result.exitCode === 0) {
        this.logger.success(`Password set for user ${username}.`);
        return;
      }
      this.logger.debug(`change-password exited with ${result.exitCode}: ${result.stderr.trim()}`);
    } catch (error) {
      this.logger.debug(`change-password failed: ${describe(error)}`);
    }
    this.warn(PASSWORD_WARNING);
  }

  private async verify(): Promise<void> {
    this.logger.info("Verifying installation...");

    this.verified = await this.docker.isContainerRunning(this.config.containers.app);
    if (this.verified) {
      this.logger.success("Faraday application is running.");
    } else {
      this.logger.error("Faraday application is not running.");
      this.mark("verify", "failed");
    }

    const status = await this.httpProbe(getAppUrl(this.config));
    if (status === 200) {
      this.logger.success("Web interface is accessible.");
    } else {
      this.warn(WEB_NOT_READY_WARNING);
    }
  }

  private async showSummary(): Promise<void> {
    let containers: ContainerInfo[] = [];
    try {
      containers = await this.docker.listContainers({
        all: true,
        names: stopOrder(this.config),
      });
    } catch (error) {
      this.warn(`Could not read container status: ${describe(error)}`);
    }

    this.summary = renderSummary(this.config, containers);
    for (const line of this.summary) {
      this.logger.info(line);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async launch(spec: ContainerSpec): Promise<void> {
    const id = await this.docker.runContainer(spec);
    this.logger.debug(`${spec.name} started (${id.substring(0, 12)})`);
  }

  private async waitForService(
    service: string,
    timeoutMs: number,
    probe: () => Promise<boolean>,
  ): Promise<void> {
    const ready = await waitUntil(probe, {
      timeoutMs,
      intervalMs: this.config.readiness.interval_ms,
      clock: this.clock,
    });
    if (!ready) {
      throw new ReadinessTimeoutError(service, timeoutMs);
    }
    this.logger.success(`${service} is ready.`);
  }

  private async runStage(stage: Stage, handler: () => Promise<void>): Promise<void> {
    this.outcomes.push({ stage, status: "ok" });
    try {
      await handler();
    } catch (error) {
      this.mark(stage, "failed");
      throw error;
    }
  }

  private warn(message: string): void {
    this.logger.warn(message);
    this.warnings.push(message);
    const current = this.outcomes[this.outcomes.length - 1];
    if (current && current.status === "ok") {
      current.status = "warning";
    }
  }

  private mark(stage: Stage, status: StageStatus): void {
    const outcome = this.outcomes.find((o) => o.stage === stage);
    if (outcome) {
      outcome.status = status;
    }
  }

  private reset(): void {
    this.outcomes = [];
    this.warnings = [];
    this.verified = false;
    this.summary = [];
  }

  private report(): ProvisionReport {
    return {
      stages: this.outcomes.map((o) => ({ ...o })),
      warnings: [...this.warnings],
      verified: this.verified,
      summary: [...this.summary],
    };
  }
}
