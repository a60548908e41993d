// src/presence/engine.ts — PresenceEngine: the seven presence operations
//
// The engine is the only writer of the three stores. Work on one username is
// serialized through a KeyedMutex; different usernames never contend.
//
//   register  policy check, then atomic account insert
//   login     verify key, mark online for the TTL (optionally set message)
//   logoff    verify key, mark offline (NOT_ONLINE if already offline)
//   bump      verify key, slide the expiry forward (NOT_ONLINE if lapsed)
//   finger    optional auth; authenticated lookups are logged on the subject
//   list      usernames online right now
//   check     verify key, read back who fingered you
//
// sweep() is the scheduler's entry point for writing expiry back to storage.

import { KeyedMutex } from "../shared/mutex.js"
import type { TimeProvider } from "../shared/time-provider.js"
import type { AccountStore } from "./account-store.js"
import { generateAuthKey, safeCompare } from "./credentials.js"
import { PresenceError, authFailed } from "./errors.js"
import type { PresenceStore } from "./presence-store.js"
import {
  ONLINE_TTL_MS,
  type PresenceView,
  type Registration,
  type RegistrationPolicy,
  type VisibilityEntry,
} from "./types.js"
import type { VisibilityLog } from "./visibility-log.js"

export interface PresenceEngineDeps {
  accounts: AccountStore
  presence: PresenceStore
  visibility: VisibilityLog
  clock: TimeProvider
  registration: RegistrationPolicy
  /** Online window for login and bump. Default one hour. */
  onlineTtlMs?: number
  /** Auth key generator; replaced in tests for predictable keys. */
  generateKey?: () => string
}

export class PresenceEngine {
  private readonly accounts: AccountStore
  private readonly presence: PresenceStore
  private readonly visibility: VisibilityLog
  private readonly clock: TimeProvider
  private readonly policy: RegistrationPolicy
  private readonly ttlMs: number
  private readonly generateKey: () => string
  private readonly locks = new KeyedMutex()

  constructor(deps: PresenceEngineDeps) {
    this.accounts = deps.accounts
    this.presence = deps.presence
    this.visibility = deps.visibility
    this.clock = deps.clock
    this.policy = deps.registration
    this.ttlMs = deps.onlineTtlMs ?? ONLINE_TTL_MS
    this.generateKey = deps.generateKey ?? generateAuthKey
  }

  get registrationMode(): RegistrationPolicy["mode"] {
    return this.policy.mode
  }

  get onlineTtlMs(): number {
    return this.ttlMs
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  /** Returns the new account's auth key. It is not retrievable afterwards. */
  async register(username: string, registrationKey?: string): Promise<Registration> {
    this.checkRegistrationPolicy(registrationKey)

    const key = this.generateKey()
    await this.accounts.create(username, key, this.clock.now())
    console.log(`[presence] registered "${username}"`)
    return { username, key }
  }

  /** `status` omitted keeps the previous status message. */
  async login(username: string, key: string, status?: string): Promise<PresenceView> {
    await this.authenticate(username, key)
    return this.locks.runExclusive(username, async () => {
      const now = this.clock.now()
      const next = await this.presence.setOnline(username, now, this.ttlMs, status)
      return { username, ...next }
    })
  }

  async logoff(username: string, key: string): Promise<PresenceView> {
    await this.authenticate(username, key)
    return this.locks.runExclusive(username, async () => {
      const now = this.clock.now()
      const current = await this.presence.getStatus(username, now)
      if (!current.online) {
        throw new PresenceError("NOT_ONLINE", `user "${username}" is not online`, { username })
      }
      const next = await this.presence.setOffline(username, now)
      return { username, ...next }
    })
  }

  async bump(username: string, key: string): Promise<PresenceView> {
    await this.authenticate(username, key)
    return this.locks.runExclusive(username, async () => {
      const next = await this.presence.bump(username, this.clock.now(), this.ttlMs)
      return { username, ...next }
    })
  }

  /**
   * Look up `subject`. Supplying any credential makes the lookup authenticated:
   * a wrong or incomplete pair fails AUTH_FAILED instead of falling back to an
   * anonymous lookup. Authenticated lookups of someone else are logged on the
   * subject; looking yourself up is not.
   */
  async finger(subject: string, username?: string, key?: string): Promise<PresenceView> {
    const observer = username !== undefined || key !== undefined
      ? await this.authenticate(username ?? "", key ?? "")
      : null

    return this.locks.runExclusive(subject, async () => {
      if (!(await this.accounts.has(subject))) {
        throw new PresenceError("USER_NOT_FOUND", `user "${subject}" not found`, { username: subject })
      }

      const now = this.clock.now()
      const status = await this.presence.getStatus(subject, now)
      if (observer !== null && observer !== subject) {
        await this.visibility.record(subject, observer, now)
      }
      return { username: subject, ...status }
    })
  }

  /** Usernames online right now, lexicographically sorted. */
  async list(): Promise<string[]> {
    return this.presence.listOnline(this.clock.now())
  }

  /** Authenticated lookups of `username` by others, oldest first. */
  async check(username: string, key: string): Promise<VisibilityEntry[]> {
    await this.authenticate(username, key)
    return this.locks.runExclusive(username, () => this.visibility.listCheckers(username))
  }

  /**
   * Take every lapsed account offline in storage. Each account is rewritten
   * under its own lock, so a login or bump that lands first is never undone.
   * Returns how many accounts changed.
   */
  async sweep(): Promise<number> {
    const lapsed = await this.presence.listLapsed(this.clock.now())
    let expired = 0
    for (const username of lapsed) {
      const changed = await this.locks.runExclusive(username, () =>
        this.presence.expire(username, this.clock.now()),
      )
      if (changed) expired++
    }
    return expired
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  /** Resolves to the username on success; every failure is the same AUTH_FAILED. */
  private async authenticate(username: string, key: string): Promise<string> {
    const valid = await this.accounts.verify(username, key)
    if (!valid || username === "" || key === "") throw authFailed()
    return username
  }

  private checkRegistrationPolicy(supplied: string | undefined): void {
    switch (this.policy.mode) {
      case "open":
        return
      case "closed":
        throw new PresenceError("REGISTRATION_CLOSED", "registration is not allowed on this server")
      case "key":
        if (supplied === undefined || !safeCompare(supplied, this.policy.key)) {
          throw new PresenceError("INVALID_REGISTRATION_KEY", "registration key is missing or invalid")
        }
        return
    }
  }
}
