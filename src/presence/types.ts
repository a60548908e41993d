// src/presence/types.ts — Presence records, views and registration policy

import { Type, type Static } from "@sinclair/typebox"

/** How long a login (or bump) keeps an account online. */
export const ONLINE_TTL_MS = 60 * 60 * 1000

// ---------------------------------------------------------------------------
// Stored records
// ---------------------------------------------------------------------------

/** The plaintext auth key is never stored, only its SHA-256 hex digest. */
export const AccountSchema = Type.Object({
  username: Type.String(),
  keyHash: Type.String(),
  createdAt: Type.Number(),
})
export type Account = Static<typeof AccountSchema>

/**
 * `expiresAt` is only meaningful while `online` is true. `since` marks the
 * last online/offline transition.
 */
export const PresenceRecordSchema = Type.Object({
  online: Type.Boolean(),
  expiresAt: Type.Union([Type.Number(), Type.Null()]),
  message: Type.String(),
  since: Type.Number(),
})
export type PresenceRecord = Static<typeof PresenceRecordSchema>

export const VisibilityEntrySchema = Type.Object({
  id: Type.String(),
  observer: Type.String(),
  subject: Type.String(),
  at: Type.Number(),
})
export type VisibilityEntry = Static<typeof VisibilityEntrySchema>

export const VisibilityListSchema = Type.Array(VisibilityEntrySchema)

// ---------------------------------------------------------------------------
// Read models
// ---------------------------------------------------------------------------

/** Status as seen at a given instant, with expiry already applied. */
export interface EffectiveStatus {
  online: boolean
  message: string
  /** Null whenever the account is not online. */
  expiresAt: number | null
  /** Null for an account that has never logged in. */
  since: number | null
}

export interface PresenceView extends EffectiveStatus {
  username: string
}

export interface Registration {
  username: string
  /** Shown to the caller once; only its digest is kept. */
  key: string
}

// ---------------------------------------------------------------------------
// Registration policy
// ---------------------------------------------------------------------------

export type RegistrationPolicy =
  | { mode: "open" }
  | { mode: "closed" }
  | { mode: "key"; key: string }

export type RegistrationMode = RegistrationPolicy["mode"]
