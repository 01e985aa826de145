import { z } from "zod";
import { isProtectedPath } from "../utils/paths.ts";

const PortSchema = z.number().int().min(1).max(65535);

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  /** Docker network joining the three containers */
  network: z.string().min(1).default("faraday_network"),

  /** Host directory mounted as the application's ~/.faraday */
  data_dir: z
    .string()
    .min(1)
    .refine((dir) => !isProtectedPath(dir), "must not be / or the home directory")
    .default("~/.faraday"),

  /** Container names */
  containers: z
    .object({
      app: z.string().min(1).default("faraday_app"),
      postgres: z.string().min(1).default("faraday_postgres"),
      redis: z.string().min(1).default("faraday_redis"),
    })
    .default({}),

  /** Image references */
  images: z
    .object({
      app: z.string().min(1).default("faradaysec/faraday:latest"),
      postgres: z.string().min(1).default("postgres:12.7-alpine"),
      redis: z.string().min(1).default("redis:6.2-alpine"),
    })
    .default({}),

  /** Published host ports */
  ports: z
    .object({
      app: PortSchema.default(5985),
      postgres: PortSchema.default(5432),
      redis: PortSchema.default(6379),
    })
    .default({}),

  /** Database credentials shared by postgres and the application */
  database: z
    .object({
      user: z.string().min(1).default("postgres"),
      password: z.string().min(1).default("postgres"),
      name: z.string().min(1).default("faraday"),
    })
    .default({}),

  /** Default login set after the application starts */
  admin: z
    .object({
      username: z.string().min(1).default("faraday"),
      password: z.string().min(1).default("Faraday123!"),
    })
    .default({}),

  /** Readiness polling (milliseconds) */
  readiness: z
    .object({
      interval_ms: z.number().int().positive().default(2000),
      postgres_timeout_ms: z.number().int().positive().default(60_000),
      redis_timeout_ms: z.number().int().positive().default(30_000),
      app_timeout_ms: z.number().int().positive().default(180_000),
    })
    .default({}),

  cleanup: z
    .object({
      /** Retry data directory removal with sudo when permission is denied */
      use_sudo: z.boolean().default(true),
    })
    .default({}),
});

/**
 * Inferred Config type from schema
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Validate and parse config data
 */
export function parseConfig(data: unknown): Config {
  return ConfigSchema.parse(data ?? {});
}

/**
 * URL the web interface is published on
 */
export function getAppUrl(config: Config): string {
  return `http://localhost:${config.ports.app}`;
}

/**
 * Host ports checked before provisioning, in check order
 */
export function getRequiredPorts(config: Config): number[] {
  return [config.ports.app, config.ports.postgres, config.ports.redis];
}
