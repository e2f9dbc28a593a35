import { z } from "zod";
import type { CliFlags } from "./cli.ts";

const chatIdPattern = /^-?\d+$/;

const configSchema = z.object({
  listen: z.string().min(1, "LISTEN must not be empty").default("0.0.0.0"),
  port: z.coerce
    .number()
    .int("PORT must be an integer")
    .min(0, "PORT must be between 0 and 65535")
    .max(65535, "PORT must be between 0 and 65535")
    .default(8080),
  webhookSecret: z.string().min(1, "GITHUB_SECRET is required"),
  telegramToken: z.string().default(""),
  // Unparseable chat ids fall back to 0, the notifier then stays disabled
  telegramChatId: z
    .string()
    .default("")
    .transform((s) => {
      const trimmed = s.trim();
      return chatIdPattern.test(trimmed) ? Number.parseInt(trimmed, 10) : 0;
    }),
  telegramTimeoutMs: z.coerce.number().int().positive("TELEGRAM_TIMEOUT_MS must be positive").default(10_000),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  version: z.string().min(1).default("dev"),
});

export type AppConfig = z.infer<typeof configSchema>;

export type ConfigParseResult =
  | { success: true; config: AppConfig }
  | { success: false; issues: string[] };

/** Build version, injected at deploy time through BUILD_VERSION. */
export function resolveVersion(env: NodeJS.ProcessEnv): string {
  return nonEmpty(env.BUILD_VERSION) ?? "dev";
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.length === 0 ? undefined : value;
}

/**
 * Build the process configuration from the environment and the parsed
 * command-line flags. A flag that was given explicitly wins over its
 * environment variable; empty environment values count as unset.
 */
export function parseConfig(env: NodeJS.ProcessEnv, flags: Pick<CliFlags, "port" | "listen"> = {}): ConfigParseResult {
  const result = configSchema.safeParse({
    listen: flags.listen ?? nonEmpty(env.LISTEN),
    port: flags.port ?? nonEmpty(env.PORT),
    webhookSecret: env.GITHUB_SECRET ?? "",
    telegramToken: nonEmpty(env.TELEGRAM_TOKEN),
    telegramChatId: nonEmpty(env.TELEGRAM_CHAT),
    telegramTimeoutMs: nonEmpty(env.TELEGRAM_TIMEOUT_MS),
    logLevel: nonEmpty(env.LOG_LEVEL),
    version: resolveVersion(env),
  });

  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }

  return { success: true, config: result.data };
}

export function loadConfig(flags: Pick<CliFlags, "port" | "listen"> = {}): AppConfig {
  const result = parseConfig(process.env, flags);

  if (!result.success) {
    console.error("FATAL: Invalid configuration:");
    for (const issue of result.issues) {
      console.error(`  ${issue}`);
    }
    process.exit(1);
  }

  return result.config;
}
