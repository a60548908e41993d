// src/persistence/json-file-kv.ts — KeyValueStore persisted as one AtomicJsonStore document
//
// The whole map lives in memory; each mutation builds the next map, writes it
// durably, and only then swaps it in. Readers therefore never observe a record
// that has not reached disk.

import { Type, type TSchema } from "@sinclair/typebox"
import { AsyncMutex } from "../shared/mutex.js"
import { AtomicJsonStore } from "./atomic-json-store.js"
import type { KeyValueStore, Updater } from "./kv.js"

const DOCUMENT_VERSION = 1

interface KeyValueDocument<T> {
  version: typeof DOCUMENT_VERSION
  records: Record<string, T>
}

export interface JsonFileKeyValueStoreOptions {
  /** TypeBox schema of a single record. */
  recordSchema: TSchema
  maxSizeBytes?: number
}

export class JsonFileKeyValueStore<T> implements KeyValueStore<T> {
  private records = new Map<string, T>()
  private readonly file: AtomicJsonStore<KeyValueDocument<T>>
  private readonly mutex = new AsyncMutex()

  private constructor(filePath: string, options: JsonFileKeyValueStoreOptions) {
    this.file = new AtomicJsonStore<KeyValueDocument<T>>(filePath, {
      maxSizeBytes: options.maxSizeBytes,
      schema: Type.Object({
        version: Type.Literal(DOCUMENT_VERSION),
        records: Type.Record(Type.String(), options.recordSchema),
      }),
    })
  }

  /** Open (or create on first write) the store at `filePath`. */
  static async open<T>(filePath: string, options: JsonFileKeyValueStoreOptions): Promise<JsonFileKeyValueStore<T>> {
    const store = new JsonFileKeyValueStore<T>(filePath, options)
    const doc = await store.file.read()
    if (doc) {
      store.records = new Map(Object.entries(doc.records))
    }
    console.log(`[store] opened ${filePath} (${store.records.size} records)`)
    return store
  }

  async get(key: string): Promise<T | undefined> {
    return this.records.get(key)
  }

  async entries(): Promise<Array<[string, T]>> {
    return Array.from(this.records)
  }

  async insertIfAbsent(key: string, value: T): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      if (this.records.has(key)) return false
      const next = new Map(this.records)
      next.set(key, value)
      await this.commit(next)
      return true
    })
  }

  async update(key: string, fn: Updater<T>): Promise<T | undefined> {
    return this.mutex.runExclusive(async () => {
      const current = this.records.get(key)
      const value = fn(current)
      if (value === undefined) return current
      const next = new Map(this.records)
      next.set(key, value)
      await this.commit(next)
      return value
    })
  }

  private async commit(next: Map<string, T>): Promise<void> {
    await this.file.write({ version: DOCUMENT_VERSION, records: Object.fromEntries(next) })
    this.records = next
  }
}
