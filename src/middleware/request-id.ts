import { createMiddleware } from "hono/factory";
import type { AppEnv } from "./types.ts";

export const REQUEST_ID_HEADER = "X-Request-Id";

/** Wall-clock epoch time in nanoseconds, as a decimal string. */
export function generateRequestId(): string {
  const epochMs = BigInt(Date.now());
  const subMs = process.hrtime.bigint() % 1_000_000n;
  return (epochMs * 1_000_000n + subMs).toString();
}

interface RequestIdOptions {
  generate?: () => string;
}

/**
 * Propagate the caller's X-Request-Id or mint a new one, expose it to
 * downstream middleware as `requestContext`, and echo it on the response.
 */
export function requestId(options: RequestIdOptions = {}) {
  const generate = options.generate ?? generateRequestId;

  return createMiddleware<AppEnv>(async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const id = incoming && incoming.length > 0 ? incoming : generate();

    c.set("requestContext", { requestId: id });
    c.header(REQUEST_ID_HEADER, id);

    await next();
  });
}
