// packages/finger-sdk/src/types.ts — fingerd SDK type definitions

export interface FingerClientConfig {
  baseUrl: string
  /** Defaults to globalThis.fetch. */
  fetch?: (input: string, init?: RequestInit) => Promise<Response>
}

/** Username and auth key returned by register(). */
export interface Credentials {
  username: string
  key: string
}

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export interface RegisterResponse {
  username: string
  key: string
  message: string
}

export interface Presence {
  username: string
  online: boolean
  status: string
  /** ISO-8601; null if the user never logged in */
  since: string | null
  /** ISO-8601; null while offline */
  expires_at: string | null
}

export interface ActionResponse {
  ok: true
  message: string
  presence: Presence
}

export interface ListResponse {
  users: string[]
}

export interface Checker {
  id: string
  observer: string
  checked_at: string
}

export interface CheckResponse {
  username: string
  checkers: Checker[]
}

export interface HealthResponse {
  status: string
  uptime: number
  registration: "open" | "closed" | "key"
  online_ttl_ms: number
}

export interface ApiError {
  error: string
  code: string
}
