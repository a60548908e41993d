// src/presence/account-store.ts — username → Account

import type { KeyValueStore } from "../persistence/kv.js"
import { digestsEqual, hashKey } from "./credentials.js"
import { PresenceError, guardStore } from "./errors.js"
import type { Account } from "./types.js"

/** Compared against when the username is unknown, so both failure paths do the same work. */
const ABSENT_ACCOUNT_DIGEST = hashKey("absent-account")

export class AccountStore {
  constructor(private readonly kv: KeyValueStore<Account>) {}

  /** Atomic check-and-insert; an existing account is never overwritten. */
  async create(username: string, authKey: string, now: number): Promise<Account> {
    const account: Account = { username, keyHash: hashKey(authKey), createdAt: now }
    const inserted = await guardStore("accounts", "create", () => this.kv.insertIfAbsent(username, account))
    if (!inserted) {
      throw new PresenceError("USERNAME_TAKEN", `username "${username}" is already taken`, { username })
    }
    return account
  }

  async lookup(username: string): Promise<Account> {
    const account = await guardStore("accounts", "lookup", () => this.kv.get(username))
    if (!account) {
      throw new PresenceError("USER_NOT_FOUND", `user "${username}" not found`, { username })
    }
    return account
  }

  async has(username: string): Promise<boolean> {
    const account = await guardStore("accounts", "has", () => this.kv.get(username))
    return account !== undefined
  }

  /** False for both an unknown username and a wrong key. */
  async verify(username: string, suppliedKey: string): Promise<boolean> {
    const account = await guardStore("accounts", "verify", () => this.kv.get(username))
    const matches = digestsEqual(hashKey(suppliedKey), account?.keyHash ?? ABSENT_ACCOUNT_DIGEST)
    return account !== undefined && matches
  }

  async count(): Promise<number> {
    const entries = await guardStore("accounts", "count", () => this.kv.entries())
    return entries.length
  }
}
