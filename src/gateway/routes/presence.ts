// src/gateway/routes/presence.ts — The seven presence actions as GET endpoints
//
// - GET /register?username=&key=       → create account, returns auth key once
// - GET /login?username=&key=&status=  → go online for the TTL
// - GET /logoff?username=&key=         → go offline
// - GET /bump?username=&key=           → extend the online window
// - GET /finger?user=&username=&key=   → look up a user (optionally authenticated)
// - GET /list                          → usernames online now
// - GET /check?username=&key=          → who fingered you

import { Hono } from "hono"
import type { PresenceEngine } from "../../presence/engine.js"
import type { PresenceView, VisibilityEntry } from "../../presence/types.js"
import { CredentialsQuery, FingerQuery, LoginQuery, RegisterQuery, parseQuery } from "../params.js"

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function isoOrNull(ms: number | null): string | null {
  return ms === null ? null : new Date(ms).toISOString()
}

export function presenceToJson(view: PresenceView) {
  return {
    username: view.username,
    online: view.online,
    status: view.message,
    since: isoOrNull(view.since),
    expires_at: isoOrNull(view.expiresAt),
  }
}

export function checkerToJson(entry: VisibilityEntry) {
  return {
    id: entry.id,
    observer: entry.observer,
    checked_at: new Date(entry.at).toISOString(),
  }
}

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export function createPresenceRoutes(engine: PresenceEngine): Hono {
  const app = new Hono()

  app.get("/register", async (c) => {
    const q = parseQuery(c, RegisterQuery)
    const result = await engine.register(q.username, q.key)
    return c.json({
      username: result.username,
      key: result.key,
      message: "Store this key securely. It will not be shown again.",
    }, 201)
  })

  app.get("/login", async (c) => {
    const q = parseQuery(c, LoginQuery, { bearerKey: true })
    const view = await engine.login(q.username, q.key, q.status)
    return c.json({ ok: true, message: "you are now logged on", presence: presenceToJson(view) })
  })

  app.get("/logoff", async (c) => {
    const q = parseQuery(c, CredentialsQuery, { bearerKey: true })
    const view = await engine.logoff(q.username, q.key)
    return c.json({ ok: true, message: "you are now logged off", presence: presenceToJson(view) })
  })

  app.get("/bump", async (c) => {
    const q = parseQuery(c, CredentialsQuery, { bearerKey: true })
    const view = await engine.bump(q.username, q.key)
    return c.json({ ok: true, message: "you are bumped", presence: presenceToJson(view) })
  })

  app.get("/finger", async (c) => {
    const q = parseQuery(c, FingerQuery, { bearerKey: true })
    const view = await engine.finger(q.user, q.username, q.key)
    return c.json(presenceToJson(view))
  })

  app.get("/list", async (c) => {
    const users = await engine.list()
    return c.json({ users })
  })

  app.get("/check", async (c) => {
    const q = parseQuery(c, CredentialsQuery, { bearerKey: true })
    const entries = await engine.check(q.username, q.key)
    return c.json({ username: q.username, checkers: entries.map(checkerToJson) })
  })

  return app
}
