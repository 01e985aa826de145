import { access, rm } from "node:fs/promises";
import { SetupError } from "../types/errors.ts";
import { isProtectedPath } from "../utils/paths.ts";
import { type CommandRunner, getCommandRunner } from "./command-runner.ts";

export type DirectoryRemover = (path: string) => Promise<void>;

export async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function isPermissionError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "EACCES" || error.code === "EPERM")
  );
}

/**
 * Remove a directory tree, retrying through sudo on permission errors
 * The application container writes the mounted directory as its own user,
 * so files under it are often not owned by the invoking user.
 */
export function createDirectoryRemover(
  useSudo: boolean,
  runner: CommandRunner = getCommandRunner(),
): DirectoryRemover {
  return async (path) => {
    if (isProtectedPath(path)) {
      throw new SetupError(`Refusing to remove ${path}`, "CLEANUP_ERROR");
    }
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      if (!useSudo || !isPermissionError(error)) {
        throw error;
      }
      const result = await runner.run("sudo", ["rm", "-rf", path], { inherit: true });
      if (result.exitCode !== 0) {
        throw new SetupError(`sudo rm -rf ${path} exited with ${result.exitCode}`, "CLEANUP_ERROR");
      }
    }
  };
}
