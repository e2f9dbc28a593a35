import { describe, expect, test } from "vitest";
import { createTelegramClient } from "./telegram-client.ts";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

describe("createTelegramClient", () => {
  test("posts markdown messages to sendMessage", async () => {
    const requests: Array<{ url: string; init: RequestInit | undefined }> = [];

    const client = createTelegramClient({
      botToken: "test-token",
      fetchImpl: async (url, init) => {
        requests.push({ url: String(url), init });
        return jsonResponse({ ok: true, result: { message_id: 77 } });
      },
    });

    const result = await client.sendMessage({ chatId: 12345, text: "*hi*", parseMode: "markdown" });

    expect(result).toEqual({ messageId: 77 });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://api.telegram.org/bottest-token/sendMessage");
    expect(requests[0]?.init?.method).toBe("POST");
    expect(requests[0]?.init?.headers).toEqual({
      "content-type": "application/json; charset=utf-8",
    });
    expect(requests[0]?.init?.body).toBe(
      JSON.stringify({ chat_id: 12345, text: "*hi*", parse_mode: "Markdown" }),
    );
    expect(requests[0]?.init?.signal).toBeInstanceOf(AbortSignal);
  });

  test("omits parse_mode for plain messages", async () => {
    const bodies: unknown[] = [];

    const client = createTelegramClient({
      botToken: "test-token",
      fetchImpl: async (_url, init) => {
        bodies.push(init?.body);
        return jsonResponse({ ok: true, result: { message_id: 1 } });
      },
    });

    await client.sendMessage({ chatId: 1, text: "hi", parseMode: "plain" });

    expect(bodies).toEqual([JSON.stringify({ chat_id: 1, text: "hi" })]);
  });

  test("honors a custom base URL", async () => {
    const urls: string[] = [];

    const client = createTelegramClient({
      botToken: "test-token",
      baseUrl: "http://localhost:9999",
      fetchImpl: async (url) => {
        urls.push(String(url));
        return jsonResponse({ ok: true, result: { id: 5, username: "star_bot" } });
      },
    });

    const me = await client.getMe();

    expect(me).toEqual({ id: 5, username: "star_bot" });
    expect(urls).toEqual(["http://localhost:9999/bottest-token/getMe"]);
  });

  test("throws with the API description when Telegram rejects the call", async () => {
    const client = createTelegramClient({
      botToken: "test-token",
      fetchImpl: async () =>
        jsonResponse({ ok: false, error_code: 400, description: "Bad Request: chat not found" }, 400),
    });

    await expect(
      client.sendMessage({ chatId: 1, text: "hi", parseMode: "markdown" }),
    ).rejects.toThrow("Telegram API sendMessage failed: Bad Request: chat not found");
  });

  test("throws on an empty response body", async () => {
    const client = createTelegramClient({
      botToken: "test-token",
      fetchImpl: async () => new Response("", { status: 502 }),
    });

    await expect(client.getMe()).rejects.toThrow(
      "Telegram API getMe returned empty response body (status 502)",
    );
  });

  test("throws on a non-JSON response body", async () => {
    const client = createTelegramClient({
      botToken: "test-token",
      fetchImpl: async () => new Response("<html>oops</html>", { status: 200 }),
    });

    await expect(client.getMe()).rejects.toThrow(
      "Telegram API getMe returned non-JSON response: <html>oops</html>",
    );
  });

  test("throws when the result field is missing", async () => {
    const client = createTelegramClient({
      botToken: "test-token",
      fetchImpl: async () => jsonResponse({ ok: true }),
    });

    await expect(
      client.sendMessage({ chatId: 1, text: "hi", parseMode: "markdown" }),
    ).rejects.toThrow("Telegram API sendMessage response missing result field");
  });

  test("aborts calls that exceed the timeout", async () => {
    const client = createTelegramClient({
      botToken: "test-token",
      timeoutMs: 10,
      fetchImpl: (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signal.addEventListener("abort", () => reject(signal.reason));
          }
        }),
    });

    await expect(client.getMe()).rejects.toThrow();
  });
});
