import { isPortInUse, type PortChecker } from "../core/port-checker.ts";
import type { Config } from "../types/config.ts";
import { DockerNotRunningError, DockerPermissionError } from "../types/errors.ts";
import type { CommandContext } from "./context.ts";

/**
 * Result of a single health check
 */
export interface CheckResult {
  name: string;
  passed: boolean;
  message: string;
  help?: string;
}

function portOwners(config: Config): Array<{ port: number; container: string }> {
  return [
    { port: config.ports.app, container: config.containers.app },
    { port: config.ports.postgres, container: config.containers.postgres },
    { port: config.ports.redis, container: config.containers.redis },
  ];
}

/**
 * Run all health checks and return results
 */
export async function runHealthChecks(
  ctx: CommandContext,
  portInUse: PortChecker = isPortInUse,
): Promise<CheckResult[]> {
  const { config, docker } = ctx;
  const results: CheckResult[] = [];

  // 1. Docker binary
  const installed = await docker.isInstalled();
  results.push({
    name: "Docker installed",
    passed: installed,
    message: installed ? "Docker CLI found" : "Docker CLI not found",
    help: installed ? undefined : "https://docs.docker.com/engine/install/",
  });

  // 2. Daemon reachable with our permissions
  let reachable = false;
  if (!installed) {
    results.push({
      name: "Docker daemon",
      passed: false,
      message: "Skipped (Docker not installed)",
    });
  } else {
    let failure = "";
    let help: string | undefined;
    try {
      reachable = await docker.checkPermissions();
    } catch (error) {
      if (error instanceof DockerNotRunningError || error instanceof DockerPermissionError) {
        help = error.help();
      }
      failure = error instanceof Error ? error.message : String(error);
    }
    results.push({
      name: "Docker daemon",
      passed: reachable,
      message: reachable ? "Docker daemon running" : failure,
      help,
    });
  }

  // 3. Published ports; our own running containers may hold them
  for (const { port, container } of portOwners(config)) {
    if (!(await portInUse(port))) {
      results.push({ name: `Port ${port}`, passed: true, message: `Port ${port} available` });
      continue;
    }

    const ours = reachable && (await docker.isContainerRunning(container));
    results.push({
      name: `Port ${port}`,
      passed: ours,
      message: ours ? `Port ${port} used by ${container}` : `Port ${port} in use`,
      help: ours ? undefined : `Free port ${port} or change ports in the config file`,
    });
  }

  return results;
}

/**
 * Print health checks
 * @returns the process exit code
 */
export async function doctorCommand(
  ctx: CommandContext,
  options: { json?: boolean } = {},
  portInUse: PortChecker = isPortInUse,
): Promise<number> {
  const { logger } = ctx;
  const results = await runHealthChecks(ctx, portInUse);
  const passed = results.filter((r) => r.passed).length;

  if (options.json) {
    logger.print(JSON.stringify(results, null, 2));
  } else {
    logger.section("Faraday Setup Health Check");
    logger.print("");

    for (const result of results) {
      if (result.passed) {
        logger.success(result.message);
      } else {
        logger.fail(result.message);
        if (result.help) {
          logger.print(`  → Fix: ${result.help}`);
        }
      }
    }

    logger.print("", `Health: ${passed}/${results.length} checks passed`);
  }

  return passed < results.length ? 1 : 0;
}
