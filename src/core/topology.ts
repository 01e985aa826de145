import type { Config } from "../types/config.ts";
import type { ContainerSpec } from "../types/docker.ts";
import { resolvePath } from "../utils/paths.ts";

/** Where the application keeps its configuration inside the container */
export const APP_CONFIG_MOUNT = "/home/faraday/.faraday";

export const APP_ENTRYPOINT = "/entrypoint.sh";

/**
 * The three containers of an installation
 */
export interface Topology {
  network: string;
  postgres: ContainerSpec;
  redis: ContainerSpec;
  app: ContainerSpec;
}

/**
 * Derive container specs from configuration
 */
export function buildTopology(config: Config): Topology {
  const { containers, images, ports, database, network } = config;

  return {
    network,
    postgres: {
      name: containers.postgres,
      image: images.postgres,
      network,
      ports: [{ host: ports.postgres, container: 5432 }],
      env: {
        POSTGRES_USER: database.user,
        POSTGRES_PASSWORD: database.password,
        POSTGRES_DB: database.name,
      },
      volumes: [],
    },
    redis: {
      name: containers.redis,
      image: images.redis,
      network,
      ports: [{ host: ports.redis, container: 6379 }],
      env: {},
      volumes: [],
    },
    app: {
      name: containers.app,
      image: images.app,
      network,
      ports: [{ host: ports.app, container: 5985 }],
      // Service discovery goes through container names on the shared network
      env: {
        PGSQL_USER: database.user,
        PGSQL_HOST: containers.postgres,
        PGSQL_PASSWD: database.password,
        PGSQL_DBNAME: database.name,
        REDIS_SERVER: containers.redis,
      },
      volumes: [{ host: resolvePath(config.data_dir), container: APP_CONFIG_MOUNT }],
      entrypoint: APP_ENTRYPOINT,
    },
  };
}

/**
 * Container names in dependency order (database first)
 */
export function startOrder(config: Config): string[] {
  return [config.containers.postgres, config.containers.redis, config.containers.app];
}

/**
 * Container names in reverse dependency order (application first)
 */
export function stopOrder(config: Config): string[] {
  return [...startOrder(config)].reverse();
}

/**
 * Command that sets a login password inside the application container
 */
export function changePasswordCommand(username: string, password: string): string[] {
  return [
    "python3",
    "-m",
    "faraday.manage",
    "change-password",
    "--username",
    username,
    "--password",
    password,
  ];
}
