import { createServer, type Server } from "node:http";
import { getRequestListener } from "@hono/node-server";
import type { Logger } from "pino";

export const REQUEST_TIMEOUT_MS = 15_000;
export const HEADERS_TIMEOUT_MS = 10_000;
export const SOCKET_TIMEOUT_MS = 15_000;

type FetchHandler = Parameters<typeof getRequestListener>[0];

interface StartServerOptions {
  fetch: FetchHandler;
  hostname: string;
  port: number;
  logger: Logger;
}

/**
 * Bind the HTTP listener. Resolves once the socket is listening and rejects
 * if the bind fails (address in use, permission denied, bad address).
 */
export function startServer(options: StartServerOptions): Promise<Server> {
  const { fetch, hostname, port, logger } = options;

  const server = createServer(
    {
      requestTimeout: REQUEST_TIMEOUT_MS,
      headersTimeout: HEADERS_TIMEOUT_MS,
    },
    getRequestListener(fetch),
  );
  // Bounds slow writers as well as idle keep-alive sockets
  server.setTimeout(SOCKET_TIMEOUT_MS);

  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, hostname, () => {
      server.off("error", reject);
      const address = server.address();
      logger.info(
        typeof address === "object" && address !== null
          ? { address: address.address, port: address.port }
          : { address: hostname, port },
        "Serve at",
      );
      resolve(server);
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => {
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
