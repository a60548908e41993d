// tests/boot/stores.test.ts — Storage backends wired into the presence stores

import { mkdtemp, readdir, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { STORE_FILES, createStores } from "../../src/boot/stores.js"
import { recordFileName } from "../../src/persistence/json-dir-kv.js"
import { PresenceEngine } from "../../src/presence/engine.js"
import { MockTimeProvider } from "../../src/shared/time-provider.js"
import { HOUR, T0 } from "../helpers/presence.js"

describe("createStores", () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "fingerd-stores-"))
    vi.spyOn(console, "log").mockImplementation(() => {})
    vi.spyOn(console, "warn").mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dir, { recursive: true, force: true })
  })

  function engineOver(stores: Awaited<ReturnType<typeof createStores>>, clock: MockTimeProvider): PresenceEngine {
    let issued = 0
    return new PresenceEngine({
      ...stores,
      clock,
      registration: { mode: "open" },
      generateKey: () => `test-key-${++issued}`,
    })
  }

  it("warns that memory storage does not persist", async () => {
    await createStores({ storage: "memory", dataDir: dir })
    expect(console.warn).toHaveBeenCalledWith("[fingerd] storage=memory: accounts and presence are lost on restart")
  })

  it("persists accounts, presence and visibility across a restart", async () => {
    const clock = new MockTimeProvider(T0)
    const first = engineOver(await createStores({ storage: "file", dataDir: dir }), clock)
    const { key: aliceKey } = await first.register("alice")
    const { key: bobKey } = await first.register("bob")
    await first.login("alice", aliceKey, "persisted")
    await first.finger("alice", "bob", bobKey)

    expect((await readdir(dir)).filter((f) => !f.endsWith(".bak")).sort()).toEqual([
      STORE_FILES.accounts,
      STORE_FILES.presence,
      STORE_FILES.visibility,
    ])
    expect(await readdir(join(dir, STORE_FILES.visibility))).toEqual([recordFileName("alice")])

    const second = engineOver(await createStores({ storage: "file", dataDir: dir }), clock)
    expect(await second.finger("alice")).toEqual({
      username: "alice",
      online: true,
      message: "persisted",
      expiresAt: T0 + HOUR,
      since: T0,
    })
    const entries = await second.check("alice", aliceKey)
    expect(entries.map((e) => e.observer)).toEqual(["bob"])
    await expect(second.register("alice")).rejects.toMatchObject({ code: "USERNAME_TAKEN" })
  })

  it("keeps an account named __proto__ across a restart", async () => {
    const clock = new MockTimeProvider(T0)
    const first = engineOver(await createStores({ storage: "file", dataDir: dir }), clock)
    const { key } = await first.register("__proto__")
    await first.register("alice")
    await first.login("__proto__", key, "still here")

    const second = engineOver(await createStores({ storage: "file", dataDir: dir }), clock)
    await expect(second.register("__proto__")).rejects.toMatchObject({ code: "USERNAME_TAKEN" })
    expect(await second.login("__proto__", key)).toMatchObject({ online: true, message: "still here" })
  })
})
