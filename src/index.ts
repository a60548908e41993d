// src/index.ts — fingerd entry point
// Boot sequence: config → stores → engine → gateway → scheduler → serve

import { serve } from "@hono/node-server"
import { createStores } from "./boot/stores.js"
import { loadConfig } from "./config.js"
import { createApp } from "./gateway/server.js"
import { PresenceEngine } from "./presence/engine.js"
import { Scheduler } from "./scheduler/scheduler.js"
import { createPresenceSweepTask } from "./scheduler/sweep.js"
import { SystemTimeProvider } from "./shared/time-provider.js"

async function main() {
  const bootStart = Date.now()
  console.log("[fingerd] booting...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[fingerd] config loaded: port=${config.port}, storage=${config.storage}, registration=${config.registration.mode}`)

  // 2. Open stores
  const stores = await createStores(config)
  console.log(`[fingerd] stores ready: ${await stores.accounts.count()} account(s)`)

  // 3. Presence engine
  const clock = new SystemTimeProvider()
  const engine = new PresenceEngine({
    ...stores,
    clock,
    registration: config.registration,
    onlineTtlMs: config.onlineTtlMs,
  })

  // 4. Scheduler (expiry sweep)
  const scheduler = new Scheduler(clock)
  scheduler.register(createPresenceSweepTask(engine, config.sweepIntervalMs))

  // 5. Gateway
  const app = createApp(engine, { scheduler })

  // 6. Serve
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    const bootDuration = Date.now() - bootStart
    console.log(`[fingerd] ready on ${config.host}:${info.port} (boot: ${bootDuration}ms)`)
  })
  scheduler.start()

  // 7. Graceful shutdown: stop background work, then stop accepting connections
  let shuttingDown = false
  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    console.log(`[fingerd] ${signal} received, shutting down gracefully...`)

    setTimeout(() => {
      console.error("[fingerd] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    scheduler.stop()
    server.close((err) => {
      if (err) {
        console.error("[fingerd] server close error:", err)
        process.exit(1)
      }
      console.log("[fingerd] shutdown complete")
      process.exit(0)
    })
  }

  process.on("SIGTERM", () => gracefulShutdown("SIGTERM"))
  process.on("SIGINT", () => gracefulShutdown("SIGINT"))
}

main().catch((err) => {
  console.error("[fingerd] fatal:", err)
  process.exit(1)
})
