import { parseCliArgs, USAGE, type CliFlags } from "./cli.ts";
import { loadConfig, resolveVersion } from "./config.ts";
import { createApp } from "./app.ts";
import { createLogger } from "./lib/logger.ts";
import { createShutdownManager } from "./lifecycle/shutdown.ts";
import { createNotifier } from "./notify/notifier.ts";
import { createTelegramClient } from "./notify/telegram-client.ts";
import { closeServer, startServer } from "./server.ts";

function parseFlagsOrExit(): CliFlags {
  try {
    return parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`FATAL: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    process.exit(1);
  }
}

const flags = parseFlagsOrExit();

if (flags.help) {
  console.log(USAGE);
  process.exit(0);
}

if (flags.version) {
  process.stdout.write(resolveVersion(process.env));
  process.exit(0);
}

// Fail fast on missing or invalid config
const config = loadConfig(flags);
const logger = createLogger({ level: config.logLevel });
logger.info({ version: config.version }, "Init star relay");

if (!config.telegramToken) {
  logger.error("Telegram token not set");
}
if (config.telegramChatId === 0) {
  logger.error("Telegram chat id not set");
}

const telegramClient = config.telegramToken
  ? createTelegramClient({ botToken: config.telegramToken, timeoutMs: config.telegramTimeoutMs })
  : null;

if (telegramClient) {
  try {
    const me = await telegramClient.getMe();
    logger.info({ botId: me.id, botUsername: me.username }, "Telegram bot authorized");
  } catch (err) {
    logger.error({ err }, "Telegram bot authorization failed, notifications may not be delivered");
  }
}

const notifier = createNotifier({ client: telegramClient, chatId: config.telegramChatId });
const app = createApp({ config, logger, notifier });

const server = await startServer({
  fetch: app.fetch,
  hostname: config.listen,
  port: config.port,
  logger,
}).catch((err: unknown) => {
  logger.fatal({ err, listen: config.listen, port: config.port }, "Server err");
  process.exit(1);
});

createShutdownManager({ logger, close: () => closeServer(server) }).start();
