// src/gateway/server.ts — Hono HTTP server with routes

import { Hono } from "hono"
import type { PresenceEngine } from "../presence/engine.js"
import type { Scheduler } from "../scheduler/scheduler.js"
import { handleGatewayError } from "./errors.js"
import { createPresenceRoutes } from "./routes/presence.js"

export interface AppOptions {
  /** Reported on /health when present. */
  scheduler?: Scheduler
}

export function createApp(engine: PresenceEngine, options: AppOptions = {}): Hono {
  const app = new Hono()

  // Health endpoint (no auth required)
  app.get("/health", (c) => {
    return c.json({
      status: "healthy",
      uptime: process.uptime(),
      registration: engine.registrationMode,
      online_ttl_ms: engine.onlineTtlMs,
      ...(options.scheduler && { tasks: options.scheduler.getStatus() }),
    })
  })

  app.route("/", createPresenceRoutes(engine))

  app.notFound((c) => c.json({ error: `unrecognized action '${c.req.path.replace(/^\//, "")}'`, code: "UNKNOWN_ACTION" }, 404))
  app.onError(handleGatewayError)

  return app
}
