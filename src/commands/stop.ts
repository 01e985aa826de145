import { stopOrder } from "../core/topology.ts";
import type { CommandContext } from "./context.ts";

/**
 * Stop running containers, application first
 */
export async function stopCommand(ctx: CommandContext): Promise<void> {
  const { config, docker, logger } = ctx;
  await docker.checkPermissions();

  for (const name of stopOrder(config)) {
    if (!(await docker.isContainerRunning(name))) {
      logger.debug(`${name} not running`);
      continue;
    }
    await docker.stopContainer(name);
    logger.info(`Stopped ${name}`);
  }

  logger.success("Faraday services stopped");
}
