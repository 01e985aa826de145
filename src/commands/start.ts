import { startOrder } from "../core/topology.ts";
import { NotFoundError } from "../types/errors.ts";
import type { CommandContext } from "./context.ts";

/**
 * Start stopped containers, database first
 */
export async function startCommand(ctx: CommandContext): Promise<void> {
  const { config, docker, logger } = ctx;
  await docker.checkPermissions();

  const names = startOrder(config);

  // Refuse to start a partial installation
  for (const name of names) {
    if (!(await docker.containerExists(name))) {
      throw new NotFoundError("Container", name);
    }
  }

  for (const name of names) {
    if (await docker.isContainerRunning(name)) {
      logger.info(`${name} already running`);
      continue;
    }
    await docker.startContainer(name);
    logger.info(`Started ${name}`);
  }

  logger.success("Faraday services started");
}
