import type { Logger } from "pino";

interface ShutdownManagerDeps {
  logger: Logger;
  /** Stop accepting connections and wait for in-flight requests */
  close: () => Promise<void>;
  graceMs?: number;
  exit?: (code: number) => void;
}

export interface ShutdownManager {
  /** Register signal handlers. Call once at startup. */
  start(): void;
  /** Run the shutdown sequence as if the signal had been received. */
  handleSignal(signal: string): Promise<void>;
  isShuttingDown(): boolean;
}

/**
 * SIGTERM/SIGINT close the server and exit 0. If the server has not closed
 * within the grace window the process exits 1 with the work abandoned.
 */
export function createShutdownManager(deps: ShutdownManagerDeps): ShutdownManager {
  const { logger, close } = deps;
  const graceMs = deps.graceMs ?? 10_000;
  const exit = deps.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  async function handleSignal(signal: string): Promise<void> {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress, ignoring duplicate signal");
      return;
    }

    shuttingDown = true;
    logger.info({ signal, graceMs }, "Shutdown signal received, closing server");

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), graceMs);
    });

    try {
      const outcome = await Promise.race([close().then(() => "closed" as const), timedOut]);
      if (outcome === "timeout") {
        logger.error({ graceMs }, "Force exit after grace timeout, requests abandoned");
        exit(1);
        return;
      }
      logger.info("Server closed, exiting");
      exit(0);
    } catch (err) {
      logger.error({ err }, "Server close failed");
      exit(1);
    } finally {
      clearTimeout(timer);
    }
  }

  return {
    start() {
      process.on("SIGTERM", () => {
        void handleSignal("SIGTERM");
      });
      process.on("SIGINT", () => {
        void handleSignal("SIGINT");
      });
      logger.debug({ graceMs }, "Shutdown manager registered SIGTERM/SIGINT handlers");
    },

    handleSignal,

    isShuttingDown() {
      return shuttingDown;
    },
  };
}
