// src/presence/errors.ts — Typed presence errors

export type PresenceErrorCode =
  | "USERNAME_TAKEN"
  | "REGISTRATION_CLOSED"
  | "INVALID_REGISTRATION_KEY"
  | "AUTH_FAILED"
  | "NOT_ONLINE"
  | "USER_NOT_FOUND"
  | "STORE_UNAVAILABLE"

/** Typed error for every presence operation */
export class PresenceError extends Error {
  readonly name = "PresenceError"
  readonly code: PresenceErrorCode
  readonly context: Record<string, unknown>

  constructor(
    code: PresenceErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(`[presence] ${code}: ${message}`, options)
    this.code = code
    this.context = context
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    }
  }
}

export function isPresenceError(err: unknown, code?: PresenceErrorCode): err is PresenceError {
  return err instanceof PresenceError && (code === undefined || err.code === code)
}

/**
 * The one error for every credential failure. Carries no context, so an unknown
 * username and a wrong key are indistinguishable to the caller.
 */
export function authFailed(): PresenceError {
  return new PresenceError("AUTH_FAILED", "invalid username or key")
}

/**
 * Run a store operation, passing domain errors through and turning anything
 * else (I/O, corruption, size limits) into STORE_UNAVAILABLE.
 */
export async function guardStore<T>(store: string, op: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn()
  } catch (err) {
    if (isPresenceError(err)) throw err
    throw new PresenceError("STORE_UNAVAILABLE", `${store}.${op} failed`, { store, op }, { cause: err })
  }
}
