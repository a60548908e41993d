// src/persistence/json-dir-kv.ts — KeyValueStore with one AtomicJsonStore document per key
//
// For records that grow without bound (per-subject logs). Writing one key
// rewrites only that key's file, writes to different keys never wait on each
// other, and the size limit applies to each key's document on its own.
//
// File names are the hex of the key's UTF-8 bytes, so any key maps to a safe,
// case-distinct name and can be recovered from the directory listing.

import { mkdir, readdir } from "node:fs/promises"
import { join } from "node:path"
import { Type, type TSchema } from "@sinclair/typebox"
import { KeyedMutex } from "../shared/mutex.js"
import { AtomicJsonStore } from "./atomic-json-store.js"
import type { KeyValueStore, Updater } from "./kv.js"

const DOCUMENT_VERSION = 1
/** A crash mid-write can leave only the .bak or .tmp copy of a record. */
const RECORD_FILE = /^((?:[0-9a-f]{2})*)\.json(?:\.bak|\.tmp)?$/

interface RecordDocument<T> {
  version: typeof DOCUMENT_VERSION
  key: string
  value: T
}

export interface JsonDirectoryKeyValueStoreOptions {
  /** TypeBox schema of a single record. */
  recordSchema: TSchema
  /** Limit for each key's document. */
  maxSizeBytes?: number
}

export function recordFileName(key: string): string {
  return `${Buffer.from(key, "utf-8").toString("hex")}.json`
}

export class JsonDirectoryKeyValueStore<T> implements KeyValueStore<T> {
  /** Committed values; `value: undefined` caches a key known to have no file. */
  private readonly cache = new Map<string, { value: T | undefined }>()
  private readonly locks = new KeyedMutex()
  private readonly documentSchema: TSchema

  private constructor(
    readonly dirPath: string,
    private readonly options: JsonDirectoryKeyValueStoreOptions,
  ) {
    this.documentSchema = Type.Object({
      version: Type.Literal(DOCUMENT_VERSION),
      key: Type.String(),
      value: options.recordSchema,
    })
  }

  /** Open (creating if needed) the store directory at `dirPath`. */
  static async open<T>(
    dirPath: string,
    options: JsonDirectoryKeyValueStoreOptions,
  ): Promise<JsonDirectoryKeyValueStore<T>> {
    await mkdir(dirPath, { recursive: true })
    const store = new JsonDirectoryKeyValueStore<T>(dirPath, options)
    const keys = await store.keys()
    console.log(`[store] opened ${dirPath} (${keys.length} records)`)
    return store
  }

  async get(key: string): Promise<T | undefined> {
    const hit = this.cache.get(key)
    if (hit) return hit.value
    return this.locks.runExclusive(key, () => this.load(key))
  }

  /** Sorted by key. */
  async entries(): Promise<Array<[string, T]>> {
    const result: Array<[string, T]> = []
    for (const key of await this.keys()) {
      const value = await this.get(key)
      if (value !== undefined) result.push([key, value])
    }
    return result
  }

  async insertIfAbsent(key: string, value: T): Promise<boolean> {
    return this.locks.runExclusive(key, async () => {
      if ((await this.load(key)) !== undefined) return false
      await this.commit(key, value)
      return true
    })
  }

  async update(key: string, fn: Updater<T>): Promise<T | undefined> {
    return this.locks.runExclusive(key, async () => {
      const current = await this.load(key)
      const next = fn(current)
      if (next === undefined) return current
      await this.commit(key, next)
      return next
    })
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private fileFor(key: string): AtomicJsonStore<RecordDocument<T>> {
    return new AtomicJsonStore<RecordDocument<T>>(join(this.dirPath, recordFileName(key)), {
      maxSizeBytes: this.options.maxSizeBytes,
      schema: this.documentSchema,
    })
  }

  /** Caller holds the key's lock. */
  private async load(key: string): Promise<T | undefined> {
    const hit = this.cache.get(key)
    if (hit) return hit.value
    const doc = await this.fileFor(key).read()
    const value = doc === null ? undefined : doc.value
    this.cache.set(key, { value })
    return value
  }

  /** Caller holds the key's lock. Memory changes only after the write is durable. */
  private async commit(key: string, value: T): Promise<void> {
    await this.fileFor(key).write({ version: DOCUMENT_VERSION, key, value })
    this.cache.set(key, { value })
  }

  private async keys(): Promise<string[]> {
    const names = await readdir(this.dirPath)
    const keys = new Set<string>()
    for (const name of names) {
      const match = RECORD_FILE.exec(name)
      if (match) keys.add(Buffer.from(match[1], "hex").toString("utf-8"))
    }
    return Array.from(keys).sort()
  }
}
