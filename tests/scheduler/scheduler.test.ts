// tests/scheduler/scheduler.test.ts — Scheduler timing, failure tracking and the presence sweep

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { Scheduler, type ScheduledTaskDef } from "../../src/scheduler/scheduler.js"
import { createPresenceSweepTask } from "../../src/scheduler/sweep.js"
import { MockTimeProvider } from "../../src/shared/time-provider.js"
import { HOUR, T0, createTestEngine } from "../helpers/presence.js"

function task(overrides: Partial<ScheduledTaskDef> = {}): ScheduledTaskDef {
  return {
    id: "t1",
    name: "Test task",
    intervalMs: 60_000,
    jitterMs: 0,
    handler: async () => {},
    ...overrides,
  }
}

describe("Scheduler", () => {
  let clock: MockTimeProvider
  let scheduler: Scheduler

  beforeEach(() => {
    vi.useFakeTimers()
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "error").mockImplementation(() => {})
    clock = new MockTimeProvider(T0)
    scheduler = new Scheduler(clock)
  })

  afterEach(() => {
    scheduler.stop()
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  it("rejects a duplicate task id", () => {
    scheduler.register(task())
    expect(() => scheduler.register(task())).toThrow('[scheduler] task "t1" is already registered')
  })

  it("does not run anything before start()", async () => {
    const handler = vi.fn(async () => {})
    scheduler.register(task({ handler }))
    await vi.advanceTimersByTimeAsync(120_000)
    expect(handler).not.toHaveBeenCalled()
  })

  it("runs a task once per interval after start()", async () => {
    const handler = vi.fn(async () => {})
    scheduler.register(task({ handler }))
    scheduler.start()

    await vi.advanceTimersByTimeAsync(59_999)
    expect(handler).toHaveBeenCalledTimes(0)
    await vi.advanceTimersByTimeAsync(1)
    expect(handler).toHaveBeenCalledTimes(1)
    await vi.advanceTimersByTimeAsync(60_000)
    expect(handler).toHaveBeenCalledTimes(2)
  })

  it("schedules a task registered after start()", async () => {
    scheduler.start()
    const handler = vi.fn(async () => {})
    scheduler.register(task({ handler }))
    await vi.advanceTimersByTimeAsync(60_000)
    expect(handler).toHaveBeenCalledTimes(1)
  })

  it("never waits less than one second", async () => {
    const handler = vi.fn(async () => {})
    scheduler.register(task({ handler, intervalMs: 10 }))
    scheduler.start()
    await vi.advanceTimersByTimeAsync(999)
    expect(handler).not.toHaveBeenCalled()
    await vi.advanceTimersByTimeAsync(1)
    expect(handler).toHaveBeenCalledTimes(1)
  })

  it("stops firing after stop()", async () => {
    const handler = vi.fn(async () => {})
    scheduler.register(task({ handler }))
    scheduler.start()
    scheduler.stop()
    await vi.advanceTimersByTimeAsync(300_000)
    expect(handler).not.toHaveBeenCalled()
  })

  it("counts consecutive failures and reports error past the limit", async () => {
    scheduler.register(task({ handler: async () => { throw new Error("sweep failed") }, maxFailures: 2 }))

    await scheduler.runNow("t1")
    expect(scheduler.getStatus()[0]).toMatchObject({ state: "waiting", consecutiveFailures: 1, lastError: "sweep failed" })

    await scheduler.runNow("t1")
    expect(scheduler.getStatus()[0]).toMatchObject({ state: "error", consecutiveFailures: 2, lastRun: T0 })
  })

  it("clears the failure count after a success", async () => {
    let fail = true
    scheduler.register(task({ handler: async () => { if (fail) throw new Error("once") } }))
    await scheduler.runNow("t1")
    fail = false
    clock.advance(5000)
    await scheduler.runNow("t1")
    expect(scheduler.getStatus()[0]).toEqual({
      id: "t1",
      name: "Test task",
      state: "waiting",
      lastRun: T0 + 5000,
      lastError: undefined,
      consecutiveFailures: 0,
    })
  })

  it("keeps the timer going after a failing run", async () => {
    const handler = vi.fn(async () => { throw new Error("boom") })
    scheduler.register(task({ handler }))
    scheduler.start()
    await vi.advanceTimersByTimeAsync(120_000)
    expect(handler).toHaveBeenCalledTimes(2)
  })

  it("runNow rejects an unknown id", async () => {
    await expect(scheduler.runNow("missing")).rejects.toThrow('[scheduler] unknown task "missing"')
  })
})

describe("presence sweep task", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("takes lapsed accounts offline in storage", async () => {
    const t = createTestEngine()
    await t.engine.register("alice")
    await t.engine.register("bob")
    await t.engine.login("alice", "test-key-1")
    t.clock.advance(HOUR / 2)
    await t.engine.login("bob", "test-key-2")

    t.clock.advance(HOUR / 2)
    const sweep = createPresenceSweepTask(t.engine, 60_000)
    expect(sweep).toMatchObject({ id: "presence-sweep", intervalMs: 60_000, jitterMs: 6000 })
    await sweep.handler()

    expect(console.log).toHaveBeenCalledWith("[scheduler] presence sweep: 1 account(s) went offline")
    expect(await t.presence.listLapsed(t.clock.now())).toEqual([])
    expect(await t.engine.list()).toEqual(["bob"])
  })
})
