// tests/presence/errors.test.ts — PresenceError helpers

import { describe, expect, it } from "vitest"
import { PresenceError, authFailed, guardStore, isPresenceError } from "../../src/presence/errors.js"

describe("isPresenceError", () => {
  it("matches any PresenceError without a code", () => {
    expect(isPresenceError(authFailed())).toBe(true)
    expect(isPresenceError(new Error("plain"))).toBe(false)
    expect(isPresenceError("AUTH_FAILED")).toBe(false)
  })

  it("matches only the given code", () => {
    expect(isPresenceError(authFailed(), "AUTH_FAILED")).toBe(true)
    expect(isPresenceError(authFailed(), "NOT_ONLINE")).toBe(false)
  })
})

describe("guardStore", () => {
  it("passes a domain error through unchanged", async () => {
    const original = new PresenceError("NOT_ONLINE", "user \"alice\" is not online", { username: "alice" })
    await expect(guardStore("presence", "bump", async () => { throw original })).rejects.toBe(original)
  })

  it("wraps anything else as STORE_UNAVAILABLE with the cause", async () => {
    const cause = new Error("EIO")
    const err = await guardStore("presence", "bump", async () => { throw cause }).catch((e: unknown) => e)
    expect(isPresenceError(err, "STORE_UNAVAILABLE")).toBe(true)
    expect(err).toMatchObject({
      message: "[presence] STORE_UNAVAILABLE: presence.bump failed",
      context: { store: "presence", op: "bump" },
      cause,
    })
  })

  it("serializes with toJSON", () => {
    expect(authFailed().toJSON()).toEqual({
      error: "PresenceError",
      code: "AUTH_FAILED",
      message: "[presence] AUTH_FAILED: invalid username or key",
      context: {},
    })
  })
})
