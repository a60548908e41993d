// src/gateway/params.ts — Query-parameter schemas and parsing
//
// Every action is a GET with named string parameters. Registration is the only
// place a username's shape is enforced; elsewhere an odd username simply fails
// authentication or lookup like any other unknown name.

import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { Context } from "hono"

export const USERNAME_PATTERN = "^[A-Za-z0-9._-]{1,32}$"
export const MAX_STATUS_LENGTH = 256

const NewUsername = Type.String({ pattern: USERNAME_PATTERN })
const Name = Type.String({ minLength: 1 })
const Key = Type.String()

export const RegisterQuery = Type.Object({
  username: NewUsername,
  key: Type.Optional(Key),
})

export const CredentialsQuery = Type.Object({
  username: Name,
  key: Key,
})

export const LoginQuery = Type.Object({
  username: Name,
  key: Key,
  status: Type.Optional(Type.String({ maxLength: MAX_STATUS_LENGTH })),
})

export const FingerQuery = Type.Object({
  user: Name,
  username: Type.Optional(Key),
  key: Type.Optional(Key),
})

export class RequestValidationError extends Error {
  readonly param: string

  constructor(param: string, message: string) {
    super(`${param}: ${message}`)
    this.name = "RequestValidationError"
    this.param = param
  }
}

export interface ParseOptions {
  /** Accept `Authorization: Bearer <key>` when no `key` parameter is given. */
  bearerKey?: boolean
}

/** Validate the request's query string against `schema`. */
export function parseQuery<S extends TSchema>(c: Context, schema: S, options: ParseOptions = {}): Static<S> {
  const query: Record<string, string> = { ...c.req.query() }

  if (options.bearerKey && query.key === undefined) {
    const authHeader = c.req.header("Authorization")
    if (authHeader?.startsWith("Bearer ")) {
      query.key = authHeader.slice(7)
    }
  }

  if (Value.Check(schema, query)) return query

  const first = Value.Errors(schema, query).First()
  const param = first?.path.replace(/^\//, "") || "query"
  throw new RequestValidationError(param, first?.message ?? "invalid query parameters")
}
