import { NotFoundError, SetupError } from "../types/errors.ts";
import type { CommandContext } from "./context.ts";

/**
 * Parse the --tail option into a line count
 */
export function parseTailOption(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new SetupError(`Invalid --tail value '${value}': expected a whole number of lines`, "INVALID_ARGUMENT");
  }
  return Number.parseInt(value, 10);
}

/**
 * View logs of the application container
 */
export async function logsCommand(
  ctx: CommandContext,
  options: { follow?: boolean; tail?: number },
): Promise<void> {
  const { config, docker } = ctx;
  await docker.checkPermissions();

  const name = config.containers.app;
  if (!(await docker.containerExists(name))) {
    throw new NotFoundError("Container", name);
  }

  await docker.logs(name, options);
}
