import { describe, expect, test } from "vitest";
import { parseConfig, resolveVersion } from "./config.ts";

describe("parseConfig", () => {
  test("applies defaults when only the secret is set", () => {
    const result = parseConfig({ GITHUB_SECRET: "test-secret" });

    expect(result).toEqual({
      success: true,
      config: {
        listen: "0.0.0.0",
        port: 8080,
        webhookSecret: "test-secret",
        telegramToken: "",
        telegramChatId: 0,
        telegramTimeoutMs: 10_000,
        logLevel: "info",
        version: "dev",
      },
    });
  });

  test("fails when GITHUB_SECRET is missing", () => {
    const result = parseConfig({});

    expect(result).toEqual({ success: false, issues: ["webhookSecret: GITHUB_SECRET is required"] });
  });

  test("fails when GITHUB_SECRET is empty", () => {
    const result = parseConfig({ GITHUB_SECRET: "" });

    expect(result.success).toBe(false);
  });

  test("reads every environment variable", () => {
    const result = parseConfig({
      GITHUB_SECRET: "test-secret",
      PORT: "9000",
      LISTEN: "127.0.0.1",
      TELEGRAM_TOKEN: "test-token",
      TELEGRAM_CHAT: "-100200300",
      TELEGRAM_TIMEOUT_MS: "2500",
      LOG_LEVEL: "warn",
      BUILD_VERSION: "1.2.3",
    });

    expect(result).toEqual({
      success: true,
      config: {
        listen: "127.0.0.1",
        port: 9000,
        webhookSecret: "test-secret",
        telegramToken: "test-token",
        telegramChatId: -100200300,
        telegramTimeoutMs: 2500,
        logLevel: "warn",
        version: "1.2.3",
      },
    });
  });

  test("flags win over environment variables", () => {
    const result = parseConfig(
      { GITHUB_SECRET: "test-secret", PORT: "9000", LISTEN: "127.0.0.1" },
      { port: "7000", listen: "10.0.0.1" },
    );

    expect(result.success && result.config.port).toBe(7000);
    expect(result.success && result.config.listen).toBe("10.0.0.1");
  });

  test("unparseable chat id falls back to 0", () => {
    const result = parseConfig({ GITHUB_SECRET: "test-secret", TELEGRAM_CHAT: "not-a-number" });

    expect(result.success && result.config.telegramChatId).toBe(0);
  });

  test("rejects a non-numeric port", () => {
    const result = parseConfig({ GITHUB_SECRET: "test-secret", PORT: "http" });

    expect(result.success).toBe(false);
    expect(!result.success && result.issues[0]?.startsWith("port:")).toBe(true);
  });

  test("rejects an out-of-range port", () => {
    const result = parseConfig({ GITHUB_SECRET: "test-secret", PORT: "70000" });

    expect(result).toEqual({ success: false, issues: ["port: PORT must be between 0 and 65535"] });
  });
});

describe("resolveVersion", () => {
  test("defaults to dev", () => {
    expect(resolveVersion({})).toBe("dev");
    expect(resolveVersion({ BUILD_VERSION: "" })).toBe("dev");
  });

  test("uses BUILD_VERSION when set", () => {
    expect(resolveVersion({ BUILD_VERSION: "2.0.0" })).toBe("2.0.0");
  });
});
