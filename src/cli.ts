#!/usr/bin/env tsx
import { Command } from "commander";
import { loadContext } from "./commands/context.ts";
import { doctorCommand } from "./commands/doctor.ts";
import { handleError } from "./commands/handle-error.ts";
import { logsCommand, parseTailOption } from "./commands/logs.ts";
import { passwordCommand } from "./commands/password.ts";
import { setupCommand } from "./commands/setup.ts";
import { startCommand } from "./commands/start.ts";
import { statusCommand } from "./commands/status.ts";
import { stopCommand } from "./commands/stop.ts";
import { teardownCommand } from "./commands/teardown.ts";
import { initConfigManager } from "./core/config-manager.ts";
import { LogLevel, logger } from "./utils/logger.ts";

const program = new Command();

program
  .name("faraday-setup")
  .description("Provision a local Faraday vulnerability management instance on Docker")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to config file")
  .option("-v, --verbose", "Show debug output")
  .hook("preAction", (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; verbose?: boolean }>();
    if (opts.config) {
      initConfigManager(opts.config);
    }
    if (opts.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }
  });

program
  .command("setup", { isDefault: true })
  .description("Tear down any previous install and provision database, cache and application")
  .option("--strict", "Exit non-zero if the application is not running afterwards")
  .action(async (options: { strict?: boolean }) => {
    try {
      process.exitCode = await setupCommand(await loadContext(), options);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("status")
  .description("Show container and network status")
  .action(async () => {
    try {
      await statusCommand(await loadContext());
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("start")
  .description("Start stopped services")
  .action(async () => {
    try {
      await startCommand(await loadContext());
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("stop")
  .description("Stop running services")
  .action(async () => {
    try {
      await stopCommand(await loadContext());
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("logs")
  .description("View application logs")
  .option("-f, --follow", "Follow log output")
  .option("-t, --tail <lines>", "Number of lines to show", "100")
  .action(async (options: { follow?: boolean; tail: string }) => {
    try {
      await logsCommand(await loadContext(), {
        follow: options.follow,
        tail: parseTailOption(options.tail),
      });
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("password <new-password>")
  .description("Change a login password")
  .option("-u, --username <name>", "User to change (defaults to the configured admin)")
  .action(async (password: string, options: { username?: string }) => {
    try {
      await passwordCommand(await loadContext(), password, options);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("teardown")
  .description("Remove containers, network and data directory")
  .option("--keep-data", "Keep the mounted data directory")
  .action(async (options: { keepData?: boolean }) => {
    try {
      await teardownCommand(await loadContext(), options);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command("doctor")
  .description("Run preflight checks")
  .option("--json", "Output results as JSON")
  .action(async (options: { json?: boolean }) => {
    try {
      process.exitCode = await doctorCommand(await loadContext(), options);
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync().catch(handleError);
