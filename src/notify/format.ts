import type { InboundEvent } from "../webhook/types.ts";

export type MessageFormat = "plain" | "markdown";

export interface OutboundMessage {
  chatId: number;
  text: string;
  parseMode: MessageFormat;
}

export function formatEventText(event: InboundEvent): string {
  switch (event.kind) {
    case "watch":
      return (
        `New Github star for *${event.repositoryName}* repo!. \n` +
        `The *${event.repositoryName}* repo now has *${event.starCount}* stars! 🎉. \n` +
        `Your new fan is ${event.senderProfileUrl}`
      );
  }
}

export function buildOutboundMessage(chatId: number, event: InboundEvent): OutboundMessage {
  return {
    chatId,
    text: formatEventText(event),
    parseMode: "markdown",
  };
}
