import { SetupError } from "../types/errors.ts";
import { logger } from "../utils/logger.ts";

/**
 * Handle errors consistently
 */
export function handleError(error: unknown): never {
  if (error instanceof SetupError) {
    logger.error(error.message);
    if (error.help) {
      logger.print(`Help: ${error.help()}`);
    }
    process.exit(1);
  }

  if (error instanceof Error) {
    logger.error(error.message);
    process.exit(1);
  }

  logger.error("An unknown error occurred");
  process.exit(1);
}
