import { renderContainerRows } from "../core/summary.ts";
import { startOrder } from "../core/topology.ts";
import { getAppUrl } from "../types/config.ts";
import type { CommandContext } from "./context.ts";

/**
 * Show the state of the managed containers and network
 */
export async function statusCommand(ctx: CommandContext): Promise<void> {
  const { config, docker, logger } = ctx;
  await docker.checkPermissions();

  const containers = await docker.listContainers({ all: true, names: startOrder(config) });
  const networkExists = await docker.networkExists(config.network);
  const running = containers.filter((c) => c.running).length;

  logger.section("Faraday Status");
  logger.print("");
  logger.print("Containers:", ...renderContainerRows(config, containers));
  logger.print("");
  logger.print(`Network: ${config.network} (${networkExists ? "present" : "missing"})`);
  logger.print(`Running: ${running}/${startOrder(config).length}`);
  logger.print(`URL: ${getAppUrl(config)}`);
}
