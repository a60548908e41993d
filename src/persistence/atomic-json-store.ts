// src/persistence/atomic-json-store.ts — Single-document JSON file with atomic replace and .bak recovery

import { mkdir, open, readFile, rename, stat, writeFile } from "node:fs/promises"
import { dirname } from "node:path"
import { Value } from "@sinclair/typebox/value"
import type { TSchema } from "@sinclair/typebox"
import { AsyncMutex } from "../shared/mutex.js"

// ---------------------------------------------------------------------------
// Error types
// ---------------------------------------------------------------------------

/** Thrown when primary, backup and tmp copies all fail JSON/schema validation. */
export class StoreCorruptionError extends Error {
  constructor(filePath: string, reason: string) {
    super(`Store corruption: ${filePath}: ${reason}`)
    this.name = "StoreCorruptionError"
  }
}

/** Thrown when a serialized document exceeds the configured size limit. */
export class WriteSizeLimitError extends Error {
  constructor(actualBytes: number, limitBytes: number) {
    super(`Write size ${actualBytes} bytes exceeds limit of ${limitBytes} bytes`)
    this.name = "WriteSizeLimitError"
  }
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface AtomicJsonStoreOptions {
  /** Maximum serialized size in bytes. Default 32 MB. */
  maxSizeBytes?: number
  /** TypeBox schema checked on every read. */
  schema?: TSchema
}

const DEFAULT_MAX_SIZE = 32 * 1024 * 1024

// ---------------------------------------------------------------------------
// AtomicJsonStore
// ---------------------------------------------------------------------------

/**
 * Durable JSON document on disk.
 *
 * Write path: serialize -> size check -> write .tmp -> fsync -> move current
 * to .bak -> rename .tmp over primary -> fsync dir.
 *
 * Read path: primary -> .bak -> .tmp; unreadable copies are quarantined as
 * `.corrupt.{timestamp}` when none of them can be used.
 */
export class AtomicJsonStore<T> {
  readonly filePath: string
  private readonly bakPath: string
  private readonly tmpPath: string
  private readonly maxSizeBytes: number
  private readonly schema: TSchema | undefined
  private readonly mutex = new AsyncMutex()

  constructor(filePath: string, options?: AtomicJsonStoreOptions) {
    this.filePath = filePath
    this.bakPath = filePath + ".bak"
    this.tmpPath = filePath + ".tmp"
    this.maxSizeBytes = options?.maxSizeBytes ?? DEFAULT_MAX_SIZE
    this.schema = options?.schema
  }

  /** Returns null when no copy of the document exists yet. */
  async read(): Promise<T | null> {
    for (const path of [this.filePath, this.bakPath, this.tmpPath]) {
      const doc = await this.tryReadFile(path)
      if (doc !== null) return doc
    }

    const present = await Promise.all(
      [this.filePath, this.bakPath, this.tmpPath].map(async (path) => ({ path, exists: await fileExists(path) })),
    )
    if (!present.some((p) => p.exists)) return null

    for (const p of present) {
      if (p.exists) await quarantine(p.path)
    }
    throw new StoreCorruptionError(this.filePath, "primary, backup, and tmp all failed validation")
  }

  /** Replace the document. Concurrent writes to one store are serialized. */
  async write(data: T): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const json = JSON.stringify(data, sortedReplacer, 2) + "\n"
      const bytes = Buffer.byteLength(json, "utf-8")
      if (bytes > this.maxSizeBytes) {
        throw new WriteSizeLimitError(bytes, this.maxSizeBytes)
      }

      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(this.tmpPath, json, "utf-8")
      await fsyncFile(this.tmpPath)

      if (await fileExists(this.filePath)) {
        await rename(this.filePath, this.bakPath)
      }
      await rename(this.tmpPath, this.filePath)
      await fsyncDir(dirname(this.filePath))
    })
  }

  private async tryReadFile(path: string): Promise<T | null> {
    let raw: string
    try {
      raw = await readFile(path, "utf-8")
    } catch {
      return null
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      return null
    }

    if (this.schema && !Value.Check(this.schema, parsed)) {
      console.warn(`[store] ${path} failed schema validation`)
      return null
    }
    return parsed as T
  }
}

// ---------------------------------------------------------------------------
// Utility functions
// ---------------------------------------------------------------------------

/**
 * Sorts object keys so the on-disk form is deterministic. `Object.fromEntries`
 * defines data properties, so a key such as "__proto__" is kept.
 */
function sortedReplacer(_key: string, value: unknown): unknown {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)))
  }
  return value
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path)
    return true
  } catch {
    return false
  }
}

async function quarantine(path: string): Promise<void> {
  const dest = `${path}.corrupt.${Date.now()}`
  try {
    await rename(path, dest)
    console.error(`[store] quarantined ${path} -> ${dest}`)
  } catch (err) {
    console.error(`[store] failed to quarantine ${path}:`, err)
  }
}

async function fsyncFile(path: string): Promise<void> {
  const fh = await open(path, "r")
  try {
    await fh.sync()
  } finally {
    await fh.close()
  }
}

/** Directory fsync is unsupported on some platforms; failures there are ignored. */
async function fsyncDir(dirPath: string): Promise<void> {
  let fh
  try {
    fh = await open(dirPath, "r")
    await fh.sync()
  } catch (err) {
    console.debug(`[store] directory fsync skipped for ${dirPath}:`, err)
  } finally {
    await fh?.close()
  }
}
