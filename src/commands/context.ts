import { getConfigManager } from "../core/config-manager.ts";
import { type ContainerRuntime, getDockerClient } from "../core/docker-client.ts";
import type { Config } from "../types/config.ts";
import { type Logger, logger } from "../utils/logger.ts";

/**
 * What every command works against
 */
export interface CommandContext {
  config: Config;
  docker: ContainerRuntime;
  logger: Logger;
}

/**
 * Build the context from the default config file and Docker client
 */
export async function loadContext(): Promise<CommandContext> {
  return {
    config: await getConfigManager().get(),
    docker: getDockerClient(),
    logger,
  };
}
