// tests/presence/account-store.test.ts — Account creation, lookup and key verification

import { beforeEach, describe, expect, it } from "vitest"
import { MemoryKeyValueStore } from "../../src/persistence/kv.js"
import { AccountStore } from "../../src/presence/account-store.js"
import { hashKey, safeCompare, generateAuthKey } from "../../src/presence/credentials.js"
import type { Account } from "../../src/presence/types.js"
import { FailingKeyValueStore, T0, codeOf } from "../helpers/presence.js"

describe("AccountStore", () => {
  let kv: MemoryKeyValueStore<Account>
  let accounts: AccountStore

  beforeEach(() => {
    kv = new MemoryKeyValueStore<Account>()
    accounts = new AccountStore(kv)
  })

  it("stores only the digest of the key", async () => {
    const account = await accounts.create("alice", "test-key-1", T0)
    expect(account).toEqual({ username: "alice", keyHash: hashKey("test-key-1"), createdAt: T0 })
    expect(JSON.stringify(await kv.entries())).not.toContain("test-key-1")
  })

  it("never overwrites an existing account", async () => {
    await accounts.create("alice", "test-key-1", T0)
    expect(await codeOf(accounts.create("alice", "test-key-2", T0 + 1))).toBe("USERNAME_TAKEN")
    expect(await accounts.verify("alice", "test-key-1")).toBe(true)
    expect(await accounts.verify("alice", "test-key-2")).toBe(false)
  })

  it("verify is false for an unknown user and for a wrong key", async () => {
    await accounts.create("alice", "test-key-1", T0)
    expect(await accounts.verify("alice", "test-key-9")).toBe(false)
    expect(await accounts.verify("bob", "test-key-1")).toBe(false)
  })

  it("lookup fails USER_NOT_FOUND for an unknown user", async () => {
    expect(await codeOf(accounts.lookup("bob"))).toBe("USER_NOT_FOUND")
  })

  it("has and count reflect registrations", async () => {
    expect(await accounts.count()).toBe(0)
    await accounts.create("alice", "test-key-1", T0)
    await accounts.create("bob", "test-key-2", T0)
    expect(await accounts.has("alice")).toBe(true)
    expect(await accounts.has("carol")).toBe(false)
    expect(await accounts.count()).toBe(2)
  })

  it("reports an unreachable backend as STORE_UNAVAILABLE", async () => {
    const broken = new AccountStore(new FailingKeyValueStore<Account>())
    expect(await codeOf(broken.verify("alice", "test-key-1"))).toBe("STORE_UNAVAILABLE")
    expect(await codeOf(broken.create("alice", "test-key-1", T0))).toBe("STORE_UNAVAILABLE")
  })
})

describe("credentials", () => {
  it("generates distinct url-safe keys", () => {
    const a = generateAuthKey()
    const b = generateAuthKey()
    expect(a).toMatch(/^[A-Za-z0-9_-]{32}$/)
    expect(a).not.toBe(b)
  })

  it("hashKey is a sha256 hex digest", () => {
    expect(hashKey("abc")).toBe("ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad")
  })

  it("safeCompare handles different lengths", () => {
    expect(safeCompare("test-secret", "test-secret")).toBe(true)
    expect(safeCompare("test-secret", "test-secret-longer")).toBe(false)
    expect(safeCompare("", "test-secret")).toBe(false)
  })
})
