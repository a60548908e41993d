// src/presence/visibility-log.ts — Append-only "who fingered me" log per subject

import { ulid } from "ulid"
import type { KeyValueStore } from "../persistence/kv.js"
import { guardStore } from "./errors.js"
import type { VisibilityEntry } from "./types.js"

export class VisibilityLog {
  constructor(private readonly kv: KeyValueStore<VisibilityEntry[]>) {}

  async record(subject: string, observer: string, at: number): Promise<VisibilityEntry> {
    const entry: VisibilityEntry = { id: ulid(at), observer, subject, at }
    await guardStore("visibility", "record", () =>
      this.kv.update(subject, (current) => [...(current ?? []), entry]),
    )
    return entry
  }

  /** Oldest first. Returns copies; the stored log is never handed out. */
  async listCheckers(username: string): Promise<VisibilityEntry[]> {
    const entries = await guardStore("visibility", "listCheckers", () => this.kv.get(username))
    return (entries ?? []).filter((e) => e.subject === username).map((e) => ({ ...e }))
  }
}
