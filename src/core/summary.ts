import { type Config, getAppUrl } from "../types/config.ts";
import type { ContainerInfo } from "../types/docker.ts";
import { startOrder } from "./topology.ts";

const TITLE = "Faraday Setup Complete!";

/**
 * One status row per managed container, in start order
 */
export function renderContainerRows(config: Config, containers: ContainerInfo[]): string[] {
  return startOrder(config).map((name) => {
    const info = containers.find((c) => c.name === name);
    if (!info) {
      return `   ${name.padEnd(20)}missing`;
    }
    const detail = info.status && info.status !== info.state ? ` (${info.status})` : "";
    return `   ${name.padEnd(20)}${info.state}${detail}`;
  });
}

/**
 * Final report printed after provisioning
 */
export function renderSummary(config: Config, containers: ContainerInfo[]): string[] {
  const app = config.containers.app;

  return [
    "",
    TITLE,
    "=".repeat(TITLE.length),
    "",
    "Container Status:",
    ...renderContainerRows(config, containers),
    "",
    "Access Faraday:",
    `   URL: ${getAppUrl(config)}`,
    "",
    "Login Credentials:",
    `   Username: ${config.admin.username}`,
    `   Password: ${config.admin.password}`,
    "",
    "Useful Commands:",
    "   View logs: faraday-setup logs -f",
    "   Stop services: faraday-setup stop",
    "   Start services: faraday-setup start",
    "   Change password: faraday-setup password NEW_PASSWORD",
    `   Shell into the app: docker exec -it ${app} bash`,
    "",
  ];
}
