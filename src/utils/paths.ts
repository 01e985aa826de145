import { mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";

/**
 * Home directory of the invoking user
 * When running with sudo, this is the original user's home, not root's
 */
export function getHomeDir(): string {
  const sudoUser = process.env.SUDO_USER;
  if (sudoUser && sudoUser !== "root") {
    return `/home/${sudoUser}`;
  }
  return homedir();
}

/**
 * Resolve path with tilde expansion
 */
export function resolvePath(path: string): string {
  if (path.startsWith("~/")) {
    return join(getHomeDir(), path.slice(2));
  }
  if (path === "~") {
    return getHomeDir();
  }
  return resolve(path);
}

/**
 * True for paths that must never be deleted as a data directory:
 * the filesystem root and the user's home
 */
export function isProtectedPath(path: string): boolean {
  const resolved = resolvePath(path);
  return resolved === resolve("/") || resolved === resolve(getHomeDir());
}

/**
 * Get the config directory path
 */
export function getConfigDir(): string {
  return join(getHomeDir(), ".config", "faraday-setup");
}

/**
 * Get the config file path
 */
export function getConfigPath(): string {
  return join(getConfigDir(), "config.yml");
}

/**
 * Ensure parent directory exists for a file path
 */
export async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(dirname(resolvePath(filePath)), { recursive: true });
}
