import { parseArgs } from "node:util";

export interface CliFlags {
  help?: boolean;
  version?: boolean;
  port?: string;
  listen?: string;
}

export const USAGE = `Usage: star-relay [options]

Options:
  -listen <address>  IPv4 address to listen on (env LISTEN, default 0.0.0.0)
  -port <port>       Port to listen on for HTTP (env PORT, default 8080)
  -v                 Print version
  -help              Get help

Environment:
  GITHUB_SECRET        Webhook secret shared with GitHub (required)
  TELEGRAM_TOKEN       Telegram bot token
  TELEGRAM_CHAT        Telegram chat id to notify
  TELEGRAM_TIMEOUT_MS  Timeout for Telegram API calls (default 10000)
  LOG_LEVEL            pino log level (default info)`;

/**
 * Accept single-dash long flags (`-port 9000`, `-help`) alongside the
 * double-dash form by rewriting them before handing off to parseArgs.
 */
function normalizeArgs(args: string[]): string[] {
  const normalized: string[] = [];
  let passthrough = false;

  for (const arg of args) {
    if (passthrough || arg === "--") {
      passthrough = true;
      normalized.push(arg);
      continue;
    }

    const name = arg.split("=", 1)[0] ?? arg;
    if (/^-[a-z][a-z-]+$/i.test(name)) {
      normalized.push(`-${arg}`);
    } else {
      normalized.push(arg);
    }
  }

  return normalized;
}

/** Throws on unknown flags or a flag missing its value. */
export function parseCliArgs(args: string[]): CliFlags {
  const { values } = parseArgs({
    args: normalizeArgs(args),
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      port: { type: "string" },
      listen: { type: "string" },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    help: values.help,
    version: values.version,
    port: values.port,
    listen: values.listen,
  };
}
