import type { Logger } from "pino";
import type { InboundEvent } from "../webhook/types.ts";
import { buildOutboundMessage } from "./format.ts";
import type { TelegramClient } from "./telegram-client.ts";

export type NotifyOutcome = "sent" | "failed" | "disabled";

export interface Notifier {
  /**
   * Deliver a notification for the event. Never throws: delivery failures
   * are logged and reported through the outcome only.
   */
  notify(event: InboundEvent, logger: Logger): Promise<NotifyOutcome>;
}

interface NotifierDeps {
  /** null when no bot token is configured */
  client: TelegramClient | null;
  chatId: number;
}

export function createNotifier(deps: NotifierDeps): Notifier {
  const { client, chatId } = deps;

  return {
    async notify(event, logger) {
      if (!client || chatId === 0) {
        logger.warn(
          { kind: event.kind, hasToken: client !== null, chatId },
          "Telegram not configured, notification skipped",
        );
        return "disabled";
      }

      const message = buildOutboundMessage(chatId, event);
      try {
        const { messageId } = await client.sendMessage(message);
        logger.info({ kind: event.kind, chatId, messageId }, "Notification sent");
        return "sent";
      } catch (err) {
        logger.error({ err, kind: event.kind, chatId }, "Message can't send");
        return "failed";
      }
    },
  };
}
