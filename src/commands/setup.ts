import { type ProvisionerDeps, Provisioner } from "../core/provisioner.ts";
import type { CommandContext } from "./context.ts";

export interface SetupOptions {
  /** Exit non-zero when the application is not running after setup */
  strict?: boolean;
}

/**
 * Provision the full installation
 * @returns the process exit code
 */
export async function setupCommand(
  ctx: CommandContext,
  options: SetupOptions = {},
  overrides: Partial<ProvisionerDeps> = {},
): Promise<number> {
  ctx.logger.section("Faraday Vulnerability Management Platform Setup");
  ctx.logger.print("");

  const provisioner = new Provisioner({
    config: ctx.config,
    docker: ctx.docker,
    logger: ctx.logger,
    ...overrides,
  });
  const report = await provisioner.run();

  if (report.warnings.length > 0) {
    ctx.logger.info(`Setup finished with ${report.warnings.length} warning(s).`);
  }

  if (!report.verified && options.strict) {
    return 1;
  }
  return 0;
}
