// src/gateway/errors.ts — Map presence errors to HTTP responses

import type { Context } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"
import { isPresenceError, type PresenceErrorCode } from "../presence/errors.js"
import { RequestValidationError } from "./params.js"

/** Map PresenceError codes to HTTP status codes */
export function mapErrorToStatus(code: PresenceErrorCode): ContentfulStatusCode {
  switch (code) {
    case "USERNAME_TAKEN": return 409
    case "REGISTRATION_CLOSED": return 403
    case "INVALID_REGISTRATION_KEY": return 401
    case "AUTH_FAILED": return 401
    case "NOT_ONLINE": return 409
    case "USER_NOT_FOUND": return 404
    case "STORE_UNAVAILABLE": return 503
  }
}

/** Caller-facing messages. Internal detail (store names, causes) never leaves the process. */
const SAFE_MESSAGES: Record<PresenceErrorCode, string> = {
  USERNAME_TAKEN: "username already taken",
  REGISTRATION_CLOSED: "registration is not allowed on this server",
  INVALID_REGISTRATION_KEY: "server registration key is missing or invalid",
  AUTH_FAILED: "invalid username or key",
  NOT_ONLINE: "you are not online",
  USER_NOT_FOUND: "user not found",
  STORE_UNAVAILABLE: "storage temporarily unavailable",
}

export function handleGatewayError(err: Error, c: Context): Response {
  if (isPresenceError(err)) {
    if (err.code === "STORE_UNAVAILABLE") {
      console.error(`[gateway] ${c.req.path}: ${err.message}`, err.cause)
    }
    return c.json({ error: SAFE_MESSAGES[err.code], code: err.code }, mapErrorToStatus(err.code))
  }

  if (err instanceof RequestValidationError) {
    return c.json({ error: err.message, code: "INVALID_REQUEST" }, 400)
  }

  console.error(`[gateway] ${c.req.path}: unexpected error:`, err)
  return c.json({ error: "Internal error", code: "INTERNAL_ERROR" }, 500)
}
