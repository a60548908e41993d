// src/scheduler/sweep.ts — Presence sweep task

import type { PresenceEngine } from "../presence/engine.js"
import type { ScheduledTaskDef } from "./scheduler.js"

/**
 * Writes expiry back to storage through the engine. Reads already apply
 * expiry, so this only keeps stored state close to what readers see.
 */
export function createPresenceSweepTask(engine: PresenceEngine, intervalMs: number): ScheduledTaskDef {
  return {
    id: "presence-sweep",
    name: "Presence expiry sweep",
    intervalMs,
    jitterMs: Math.floor(intervalMs / 10),
    handler: async () => {
      const expired = await engine.sweep()
      if (expired > 0) {
        console.log(`[scheduler] presence sweep: ${expired} account(s) went offline`)
      }
    },
  }
}
