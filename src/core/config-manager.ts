import { readFile, writeFile } from "node:fs/promises";
import YAML from "yaml";
import { ZodError } from "zod";
import { type Config, parseConfig } from "../types/config.ts";
import { ConfigError } from "../types/errors.ts";
import { ensureParentDir, getConfigPath, resolvePath } from "../utils/paths.ts";

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Manages the installer configuration file
 */
export class ConfigManager {
  private configPath: string;
  private config: Config | null = null;

  constructor(configPath?: string) {
    this.configPath = resolvePath(configPath ?? getConfigPath());
  }

  /**
   * Load configuration from disk
   * Creates default config if not exists
   */
  async load(): Promise<Config> {
    let content: string;
    try {
      content = await readFile(this.configPath, "utf8");
    } catch (error) {
      if (!isMissingFile(error)) {
        throw new ConfigError(`Failed to load config: ${describeError(error)}`);
      }
      const defaults = parseConfig({});
      await this.save(defaults);
      return defaults;
    }

    try {
      this.config = parseConfig(YAML.parse(content));
      return this.config;
    } catch (error) {
      throw new ConfigError(`Invalid config ${this.configPath}: ${describeError(error)}`);
    }
  }

  /**
   * Save configuration to disk
   */
  async save(config: Config): Promise<void> {
    try {
      await ensureParentDir(this.configPath);
      await writeFile(this.configPath, YAML.stringify(config), "utf8");
      this.config = config;
    } catch (error) {
      throw new ConfigError(`Failed to save config: ${describeError(error)}`);
    }
  }

  /**
   * Get current configuration (loads if not cached)
   */
  async get(): Promise<Config> {
    if (this.config === null) {
      return this.load();
    }
    return this.config;
  }

  /**
   * Get the config file path
   */
  getPath(): string {
    return this.configPath;
  }
}

// Default singleton instance
let defaultInstance: ConfigManager | null = null;

/**
 * Initialize the default ConfigManager instance with a custom path
 * Must be called before first getConfigManager() call
 */
export function initConfigManager(configPath?: string): void {
  if (defaultInstance !== null) {
    throw new ConfigError("ConfigManager already initialized");
  }
  defaultInstance = new ConfigManager(configPath);
}

/**
 * Get the default ConfigManager instance
 */
export function getConfigManager(): ConfigManager {
  if (defaultInstance === null) {
    defaultInstance = new ConfigManager();
  }
  return defaultInstance;
}
