import { hostname as osHostname } from "node:os";
import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { getConnInfo } from "@hono/node-server/conninfo";
import type { Logger } from "pino";
import type { AppEnv } from "./types.ts";

const UNKNOWN = "unknown";
const NS_PER_MS = 1_000_000n;

export interface AccessLogOptions {
  logger: Logger;
  /** Monotonic clock in nanoseconds */
  now?: () => bigint;
  resolveHostname?: () => string;
  resolveRemoteAddress?: (c: Context<AppEnv>) => string | undefined;
}

/** Whole milliseconds, rounded up: 1ns of work still logs as 1. */
export function latencyMs(elapsedNs: bigint): number {
  if (elapsedNs <= 0n) return 0;
  return Number((elapsedNs + NS_PER_MS - 1n) / NS_PER_MS);
}

function socketAddress(c: Context<AppEnv>): string | undefined {
  try {
    return getConnInfo(c).remote.address;
  } catch {
    // No Node socket behind the request (e.g. app.request in tests)
    return undefined;
  }
}

function safeHostname(resolve: () => string): string {
  try {
    return resolve() || UNKNOWN;
  } catch {
    return UNKNOWN;
  }
}

/** X-Real-Ip, then X-Forwarded-For, then the socket peer. */
export function resolveClientIp(
  headers: { realIp: string | undefined; forwardedFor: string | undefined },
  remoteAddress: string | undefined,
): string {
  if (headers.realIp) return headers.realIp;
  if (headers.forwardedFor) return headers.forwardedFor;
  return remoteAddress ?? "";
}

/**
 * Emit one structured record per completed request. Latency covers the
 * whole downstream chain; the response is never touched.
 */
export function accessLog(options: AccessLogOptions) {
  const { logger } = options;
  const now = options.now ?? (() => process.hrtime.bigint());
  const resolveHostname = options.resolveHostname ?? osHostname;
  const resolveRemoteAddress = options.resolveRemoteAddress ?? socketAddress;

  return createMiddleware<AppEnv>(async (c, next) => {
    const start = now();

    try {
      await next();
    } finally {
      const latency = latencyMs(now() - start);
      const requestId = c.get("requestContext")?.requestId ?? UNKNOWN;

      logger.info(
        {
          hostname: safeHostname(resolveHostname),
          requestId,
          latency,
          clientIp: resolveClientIp(
            { realIp: c.req.header("x-real-ip"), forwardedFor: c.req.header("x-forwarded-for") },
            resolveRemoteAddress(c),
          ),
          method: c.req.method,
          path: c.req.path,
          status: c.res.status,
          header: c.req.header(),
          referer: c.req.header("referer") ?? "",
          userAgent: c.req.header("user-agent") ?? "",
        },
        "Request",
      );
    }
  });
}
