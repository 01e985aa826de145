import { Provisioner } from "../core/provisioner.ts";
import type { CommandContext } from "./context.ts";

/**
 * Remove the installation's containers, network and data
 */
export async function teardownCommand(
  ctx: CommandContext,
  options: { keepData?: boolean } = {},
): Promise<void> {
  const { logger } = ctx;

  logger.section("Faraday Teardown");
  logger.print("");

  const provisioner = new Provisioner({ config: ctx.config, docker: ctx.docker, logger });
  const warnings = await provisioner.teardown(options);

  if (warnings.length > 0) {
    logger.fail(`Teardown finished with ${warnings.length} warning(s)`);
    return;
  }
  logger.success("Teardown complete");
}
