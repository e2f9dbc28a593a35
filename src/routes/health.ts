import { Hono } from "hono";
import type { AppEnv } from "../middleware/types.ts";

interface HealthRouteDeps {
  version: string;
}

export function createHealthRoutes(deps: HealthRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  // Liveness only, there are no downstream dependencies worth probing
  app.get("/health", (c) => c.text("OK"));

  app.get("/version", (c) => c.json({ version: deps.version }));

  return app;
}
