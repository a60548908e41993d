// src/scheduler/scheduler.ts — Periodic background tasks (presence sweep)

import { SystemTimeProvider, type TimeProvider } from "../shared/time-provider.js"

export interface ScheduledTaskDef {
  id: string
  name: string
  intervalMs: number
  jitterMs: number
  handler: () => Promise<void>
  /** Consecutive failures before the task reports "error". Default 3. */
  maxFailures?: number
}

interface RunningTask {
  def: ScheduledTaskDef
  timer: ReturnType<typeof setTimeout> | undefined
  lastRun: number | undefined
  lastError: string | undefined
  consecutiveFailures: number
  running: boolean
}

export interface TaskStatus {
  id: string
  name: string
  state: "running" | "waiting" | "error"
  lastRun: number | undefined
  lastError: string | undefined
  consecutiveFailures: number
}

const MIN_DELAY_MS = 1000

export class Scheduler {
  private tasks = new Map<string, RunningTask>()
  private started = false

  constructor(private readonly clock: TimeProvider = new SystemTimeProvider()) {}

  register(def: ScheduledTaskDef): void {
    if (this.tasks.has(def.id)) {
      throw new Error(`[scheduler] task "${def.id}" is already registered`)
    }
    const task: RunningTask = {
      def,
      timer: undefined,
      lastRun: undefined,
      lastError: undefined,
      consecutiveFailures: 0,
      running: false,
    }
    this.tasks.set(def.id, task)
    if (this.started) this.scheduleNext(task)
  }

  start(): void {
    if (this.started) return
    this.started = true

    for (const task of this.tasks.values()) {
      this.scheduleNext(task)
    }
  }

  stop(): void {
    this.started = false
    for (const task of this.tasks.values()) {
      if (task.timer) {
        clearTimeout(task.timer)
        task.timer = undefined
      }
    }
  }

  /** Run a task immediately, outside its timer. */
  async runNow(id: string): Promise<void> {
    const task = this.tasks.get(id)
    if (!task) throw new Error(`[scheduler] unknown task "${id}"`)
    await this.runTask(task)
  }

  getStatus(): TaskStatus[] {
    return Array.from(this.tasks.values()).map((t) => {
      let state: TaskStatus["state"] = "waiting"
      if (t.running) state = "running"
      else if (t.consecutiveFailures >= (t.def.maxFailures ?? 3)) state = "error"

      return {
        id: t.def.id,
        name: t.def.name,
        state,
        lastRun: t.lastRun,
        lastError: t.lastError,
        consecutiveFailures: t.consecutiveFailures,
      }
    })
  }

  private scheduleNext(task: RunningTask): void {
    if (!this.started) return

    const jitter = task.def.jitterMs * (2 * Math.random() - 1) // ±jitter
    const delay = Math.max(MIN_DELAY_MS, task.def.intervalMs + jitter)

    task.timer = setTimeout(async () => {
      await this.runTask(task)
      this.scheduleNext(task)
    }, delay)

    // Allow Node to exit cleanly if only timers remain
    task.timer.unref()
  }

  private async runTask(task: RunningTask): Promise<void> {
    if (task.running) return
    task.running = true
    try {
      await task.def.handler()
      task.lastError = undefined
      task.consecutiveFailures = 0
    } catch (err) {
      task.lastError = err instanceof Error ? err.message : String(err)
      task.consecutiveFailures++
      console.error(`[scheduler] task ${task.def.id} failed:`, task.lastError)
    } finally {
      task.lastRun = this.clock.now()
      task.running = false
    }
  }
}
