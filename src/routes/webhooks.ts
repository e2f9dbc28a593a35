import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppConfig } from "../config.ts";
import { createChildLogger } from "../lib/logger.ts";
import type { AppEnv } from "../middleware/types.ts";
import type { Notifier } from "../notify/notifier.ts";
import { decodeWebhook } from "../webhook/decode.ts";

export const ACK_HANDLED = "OK";
export const ACK_GENERIC = "Event received. Have a nice day";

interface WebhookRouteDeps {
  config: Pick<AppConfig, "webhookSecret">;
  logger: Logger;
  notifier: Notifier;
}

/**
 * GitHub always gets a 200: rejected signatures and failed notifications are
 * visible in the logs only, so GitHub never retries a delivery.
 */
export function createWebhookRoutes(deps: WebhookRouteDeps): Hono<AppEnv> {
  const { config, logger, notifier } = deps;
  const app = new Hono<AppEnv>();

  app.post("/webhook", async (c) => {
    const eventName = c.req.header("x-github-event");
    const childLogger = createChildLogger(logger, {
      requestId: c.get("requestContext")?.requestId,
      eventName,
    });

    // Raw body first: parsing before verification would break the HMAC
    const body = await c.req.text();

    const result = await decodeWebhook(config.webhookSecret, {
      body,
      signature: c.req.header("x-hub-signature-256"),
      eventName,
    });

    switch (result.status) {
      case "rejected":
        childLogger.error(
          { event: eventName ?? "", reason: result.reason },
          "Webhook rejected",
        );
        return c.text(ACK_GENERIC);

      case "ignored":
        childLogger.debug({ event: result.eventName }, "Webhook event ignored");
        return c.text(ACK_GENERIC);

      case "matched":
        childLogger.info(
          { kind: result.event.kind, repository: result.event.repositoryName },
          "Watch event received",
        );
        await notifier.notify(result.event, childLogger);
        return c.text(ACK_HANDLED);
    }
  });

  return app;
}
