// src/boot/stores.ts — Build the presence stores for the configured storage backend

import { join } from "node:path"
import type { FingerdConfig } from "../config.js"
import { JsonDirectoryKeyValueStore } from "../persistence/json-dir-kv.js"
import { JsonFileKeyValueStore } from "../persistence/json-file-kv.js"
import { MemoryKeyValueStore, type KeyValueStore } from "../persistence/kv.js"
import { AccountStore } from "../presence/account-store.js"
import { PresenceStore } from "../presence/presence-store.js"
import {
  AccountSchema,
  PresenceRecordSchema,
  VisibilityListSchema,
  type Account,
  type PresenceRecord,
  type VisibilityEntry,
} from "../presence/types.js"
import { VisibilityLog } from "../presence/visibility-log.js"

export interface PresenceStores {
  accounts: AccountStore
  presence: PresenceStore
  visibility: VisibilityLog
}

/** Accounts and presence are single documents; visibility is a directory with one file per subject. */
export const STORE_FILES = {
  accounts: "accounts.json",
  presence: "presence.json",
  visibility: "visibility",
} as const

export function buildStores(
  accountsKv: KeyValueStore<Account>,
  presenceKv: KeyValueStore<PresenceRecord>,
  visibilityKv: KeyValueStore<VisibilityEntry[]>,
): PresenceStores {
  const accounts = new AccountStore(accountsKv)
  return {
    accounts,
    presence: new PresenceStore(presenceKv, accounts),
    visibility: new VisibilityLog(visibilityKv),
  }
}

export function createMemoryStores(): PresenceStores {
  return buildStores(
    new MemoryKeyValueStore<Account>(),
    new MemoryKeyValueStore<PresenceRecord>(),
    new MemoryKeyValueStore<VisibilityEntry[]>(),
  )
}

/** Opens accounts.json, presence.json and the visibility/ directory under `dataDir`. */
export async function openFileStores(dataDir: string): Promise<PresenceStores> {
  const [accountsKv, presenceKv, visibilityKv] = await Promise.all([
    JsonFileKeyValueStore.open<Account>(join(dataDir, STORE_FILES.accounts), { recordSchema: AccountSchema }),
    JsonFileKeyValueStore.open<PresenceRecord>(join(dataDir, STORE_FILES.presence), { recordSchema: PresenceRecordSchema }),
    JsonDirectoryKeyValueStore.open<VisibilityEntry[]>(join(dataDir, STORE_FILES.visibility), { recordSchema: VisibilityListSchema }),
  ])
  return buildStores(accountsKv, presenceKv, visibilityKv)
}

export async function createStores(config: Pick<FingerdConfig, "storage" | "dataDir">): Promise<PresenceStores> {
  if (config.storage === "memory") {
    console.warn("[fingerd] storage=memory: accounts and presence are lost on restart")
    return createMemoryStores()
  }
  return openFileStores(config.dataDir)
}
