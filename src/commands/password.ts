import { changePasswordCommand } from "../core/topology.ts";
import { DockerError, NotFoundError } from "../types/errors.ts";
import type { CommandContext } from "./context.ts";

/**
 * Change a login password inside the running application
 */
export async function passwordCommand(
  ctx: CommandContext,
  password: string,
  options: { username?: string } = {},
): Promise<void> {
  const { config, docker, logger } = ctx;
  await docker.checkPermissions();

  const name = config.containers.app;
  const username = options.username ?? config.admin.username;

  const container = await docker.getContainer(name);
  if (!container) {
    throw new NotFoundError("Container", name);
  }
  if (!container.running) {
    throw new DockerError(`Container '${name}' is not running. Run: faraday-setup start`);
  }

  const result = await docker.exec(name, changePasswordCommand(username, password));
  if (result.exitCode !== 0) {
    throw new DockerError(
      `Failed to change password for ${username}: ${result.stderr.trim() || `exit code ${result.exitCode}`}`,
    );
  }

  logger.success(`Password changed for ${username}`);
}
