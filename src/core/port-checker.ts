import { createServer } from "node:net";

export type PortChecker = (port: number) => Promise<boolean>;

/**
 * Check whether something already listens on a TCP port
 * Only EADDRINUSE counts as busy; other bind errors (e.g. EACCES on
 * privileged ports) say nothing about the port's owner.
 */
export const isPortInUse: PortChecker = (port) =>
  new Promise((resolve) => {
    const server = createServer();

    server.once("error", (error: NodeJS.ErrnoException) => {
      resolve(error.code === "EADDRINUSE");
    });

    server.once("listening", () => {
      server.close(() => resolve(false));
    });

    server.listen({ port, exclusive: true });
  });
