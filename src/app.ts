import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppConfig } from "./config.ts";
import { accessLog, type AccessLogOptions } from "./middleware/access-log.ts";
import { requestId } from "./middleware/request-id.ts";
import type { AppEnv } from "./middleware/types.ts";
import type { Notifier } from "./notify/notifier.ts";
import { createHealthRoutes } from "./routes/health.ts";
import { createWebhookRoutes } from "./routes/webhooks.ts";

interface AppDeps {
  config: Pick<AppConfig, "webhookSecret" | "version">;
  logger: Logger;
  notifier: Notifier;
  accessLog?: Omit<AccessLogOptions, "logger">;
  generateRequestId?: () => string;
}

/**
 * Request id outermost so the access log can read it once the route has
 * finished; the access log wraps the routes so latency covers the handler.
 */
export function createApp(deps: AppDeps): Hono<AppEnv> {
  const { config, logger, notifier } = deps;
  const app = new Hono<AppEnv>();

  app.use("*", requestId({ generate: deps.generateRequestId }));
  app.use("*", accessLog({ ...deps.accessLog, logger }));

  app.route("/", createHealthRoutes({ version: config.version }));
  app.route("/", createWebhookRoutes({ config, logger, notifier }));

  app.onError((err, c) => {
    logger.error({ err, path: c.req.path, method: c.req.method }, "Unhandled error");
    return c.json({ error: "Internal Server Error" }, 500);
  });

  return app;
}
