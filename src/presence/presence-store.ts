// src/presence/presence-store.ts — username → PresenceRecord with lazy expiry
//
// There is no background timer per account: whether a record is online is
// decided against the `now` passed to each call. Expired "online" records are
// rewritten to offline when read, and by the engine's periodic sweep.

import type { KeyValueStore } from "../persistence/kv.js"
import type { AccountStore } from "./account-store.js"
import { PresenceError, guardStore } from "./errors.js"
import type { EffectiveStatus, PresenceRecord } from "./types.js"

const NEVER_LOGGED_IN: EffectiveStatus = { online: false, message: "", expiresAt: null, since: null }

/** Online iff flagged online and `now` is strictly before the expiry. */
export function isLive(record: PresenceRecord, now: number): boolean {
  return record.online && record.expiresAt !== null && now < record.expiresAt
}

function isLapsed(record: PresenceRecord, now: number): boolean {
  return record.online && !isLive(record, now)
}

/** Offline form of a lapsed record; `since` becomes the moment it lapsed. */
function lapse(record: PresenceRecord): PresenceRecord {
  return { ...record, online: false, expiresAt: null, since: record.expiresAt ?? record.since }
}

function toStatus(record: PresenceRecord, now: number): EffectiveStatus {
  if (isLive(record, now)) {
    return { online: true, message: record.message, expiresAt: record.expiresAt, since: record.since }
  }
  const settled = record.online ? lapse(record) : record
  return { online: false, message: settled.message, expiresAt: null, since: settled.since }
}

export class PresenceStore {
  constructor(
    private readonly kv: KeyValueStore<PresenceRecord>,
    private readonly accounts: AccountStore,
  ) {}

  async getStatus(username: string, now: number): Promise<EffectiveStatus> {
    const record = await guardStore("presence", "getStatus", () => this.kv.get(username))
    if (!record) return NEVER_LOGGED_IN
    if (!isLapsed(record, now)) return toStatus(record, now)

    // Re-checked inside the update: a concurrent bump may already have revived it.
    const settled = await guardStore("presence", "getStatus", () =>
      this.kv.update(username, (current) => (current && isLapsed(current, now) ? lapse(current) : undefined)),
    )
    return toStatus(settled ?? record, now)
  }

  /** `message` omitted keeps the previous message (or "" on first login). */
  async setOnline(username: string, now: number, durationMs: number, message?: string): Promise<EffectiveStatus> {
    if (!(await this.accounts.has(username))) {
      throw new PresenceError("USER_NOT_FOUND", `user "${username}" not found`, { username })
    }

    const next = await guardStore("presence", "setOnline", () =>
      this.kv.update(username, (current) => ({
        online: true,
        expiresAt: now + durationMs,
        message: message ?? current?.message ?? "",
        since: current && isLive(current, now) ? current.since : now,
      })),
    )
    return next ? toStatus(next, now) : NEVER_LOGGED_IN
  }

  /** Sliding window: the new expiry counts from `now`, not from the login. */
  async bump(username: string, now: number, durationMs: number): Promise<EffectiveStatus> {
    const next = await guardStore("presence", "bump", () =>
      this.kv.update(username, (current) => {
        if (!current || !isLive(current, now)) {
          throw new PresenceError("NOT_ONLINE", `user "${username}" is not online`, { username })
        }
        return { ...current, expiresAt: now + durationMs }
      }),
    )
    return next ? toStatus(next, now) : NEVER_LOGGED_IN
  }

  /** Message is kept. A never-logged-in account is left untouched. */
  async setOffline(username: string, now: number): Promise<EffectiveStatus> {
    const next = await guardStore("presence", "setOffline", () =>
      this.kv.update(username, (current) =>
        current ? { ...current, online: false, expiresAt: null, since: now } : undefined,
      ),
    )
    return next ? toStatus(next, now) : NEVER_LOGGED_IN
  }

  /** Usernames online at `now`, sorted by code unit. */
  async listOnline(now: number): Promise<string[]> {
    const entries = await guardStore("presence", "listOnline", () => this.kv.entries())
    return entries
      .filter(([, record]) => isLive(record, now))
      .map(([username]) => username)
      .sort()
  }

  /** Usernames whose stored record still says online but has lapsed at `now`. */
  async listLapsed(now: number): Promise<string[]> {
    const entries = await guardStore("presence", "listLapsed", () => this.kv.entries())
    return entries
      .filter(([, record]) => isLapsed(record, now))
      .map(([username]) => username)
      .sort()
  }

  /**
   * Rewrite one lapsed record to offline. Re-checked inside the update, so a
   * record revived since it was listed is left alone. Returns whether it changed.
   */
  async expire(username: string, now: number): Promise<boolean> {
    let changed = false
    await guardStore("presence", "expire", () =>
      this.kv.update(username, (current) => {
        if (!current || !isLapsed(current, now)) return undefined
        changed = true
        return lapse(current)
      }),
    )
    return changed
  }
}
