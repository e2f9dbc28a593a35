import type { OutboundMessage } from "./format.ts";

const TELEGRAM_API_BASE_URL = "https://api.telegram.org";

interface CreateTelegramClientInput {
  botToken: string;
  fetchImpl?: (url: string | URL | Request, init?: RequestInit) => Promise<Response>;
  timeoutMs?: number;
  baseUrl?: string;
}

interface TelegramApiResponse<T> {
  ok?: boolean;
  description?: string;
  error_code?: number;
  result?: T;
}

interface TelegramUser {
  id: number;
  username?: string;
}

interface TelegramMessage {
  message_id: number;
}

async function parseTelegramPayload<T>(response: Response, method: string): Promise<TelegramApiResponse<T>> {
  const raw = await response.text();

  if (!raw.trim()) {
    throw new Error(`Telegram API ${method} returned empty response body (status ${response.status})`);
  }

  try {
    return JSON.parse(raw) as TelegramApiResponse<T>;
  } catch {
    throw new Error(`Telegram API ${method} returned non-JSON response: ${raw.slice(0, 200)}`);
  }
}

export interface TelegramClient {
  getMe(): Promise<{ id: number; username: string | undefined }>;
  sendMessage(message: OutboundMessage): Promise<{ messageId: number }>;
}

/**
 * Minimal Bot API client. Holds no per-request state, so one instance is
 * shared by every request handler.
 */
export function createTelegramClient(input: CreateTelegramClientInput): TelegramClient {
  const fetchImpl = input.fetchImpl ?? fetch;
  const timeoutMs = input.timeoutMs ?? 10_000;
  const baseUrl = input.baseUrl ?? TELEGRAM_API_BASE_URL;

  async function call<T>(method: string, body?: Record<string, unknown>): Promise<T> {
    const response = await fetchImpl(`${baseUrl}/bot${input.botToken}/${method}`, {
      method: "POST",
      headers: {
        "content-type": "application/json; charset=utf-8",
      },
      body: body ? JSON.stringify(body) : undefined,
      signal: AbortSignal.timeout(timeoutMs),
    });

    // Telegram reports failures as JSON with ok=false, usually with a 4xx status
    const payload = await parseTelegramPayload<T>(response, method);
    if (!response.ok || !payload.ok) {
      throw new Error(
        `Telegram API ${method} failed: ${payload.description ?? `status ${response.status}`}`,
      );
    }

    if (payload.result === undefined) {
      throw new Error(`Telegram API ${method} response missing result field`);
    }

    return payload.result;
  }

  return {
    async getMe() {
      const user = await call<TelegramUser>("getMe");
      return { id: user.id, username: user.username };
    },

    async sendMessage(message: OutboundMessage) {
      const result = await call<TelegramMessage>("sendMessage", {
        chat_id: message.chatId,
        text: message.text,
        ...(message.parseMode === "markdown" ? { parse_mode: "Markdown" } : {}),
      });
      return { messageId: result.message_id };
    },
  };
}
