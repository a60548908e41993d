// packages/finger-sdk/src/client.ts — FingerClient
//
// Typed client for the fingerd presence API. Every action is a GET with query
// parameters; the auth key travels as the `key` parameter.

import type {
  ActionResponse,
  ApiError,
  CheckResponse,
  Credentials,
  FingerClientConfig,
  HealthResponse,
  ListResponse,
  Presence,
  RegisterResponse,
} from "./types.js"

type Params = Record<string, string | undefined>

// ---------------------------------------------------------------------------
// FingerClient
// ---------------------------------------------------------------------------

export class FingerClient {
  private readonly baseUrl: string
  private readonly _fetch: (input: string, init?: RequestInit) => Promise<Response>

  constructor(config: FingerClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "")
    this._fetch = config.fetch ?? ((input, init) => globalThis.fetch(input, init))
  }

  /** Create an account. The returned key is shown once; keep it. */
  async register(username: string, registrationKey?: string): Promise<RegisterResponse> {
    return this.get<RegisterResponse>("register", { username, key: registrationKey })
  }

  async login(credentials: Credentials, status?: string): Promise<ActionResponse> {
    return this.get<ActionResponse>("login", { ...auth(credentials), status })
  }

  async logoff(credentials: Credentials): Promise<ActionResponse> {
    return this.get<ActionResponse>("logoff", auth(credentials))
  }

  async bump(credentials: Credentials): Promise<ActionResponse> {
    return this.get<ActionResponse>("bump", auth(credentials))
  }

  /** Anonymous unless credentials are given; authenticated lookups are visible to `user`. */
  async finger(user: string, credentials?: Credentials): Promise<Presence> {
    return this.get<Presence>("finger", { user, username: credentials?.username, key: credentials?.key })
  }

  async list(): Promise<string[]> {
    const res = await this.get<ListResponse>("list", {})
    return res.users
  }

  async check(credentials: Credentials): Promise<CheckResponse> {
    return this.get<CheckResponse>("check", auth(credentials))
  }

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>("health", {})
  }

  // -------------------------------------------------------------------------
  // Internal Helpers
  // -------------------------------------------------------------------------

  private async get<T>(action: string, params: Params): Promise<T> {
    const search = new URLSearchParams()
    for (const [name, value] of Object.entries(params)) {
      if (value !== undefined) search.set(name, value)
    }
    const qs = search.toString()
    const url = `${this.baseUrl}/${action}${qs ? `?${qs}` : ""}`

    const res = await this._fetch(url, { method: "GET" })
    if (!res.ok) {
      await this.throwApiError(res)
    }
    return res.json() as Promise<T>
  }

  private async throwApiError(res: Response): Promise<never> {
    let body: unknown = null
    try {
      body = await res.json()
    } catch {
      // Non-JSON response
    }
    const { error, code } = toApiError(body)
    throw new FingerApiError(error ?? `HTTP ${res.status}`, code ?? "UNKNOWN", res.status)
  }
}

/** Only the two credential fields go on the wire, whatever else the object carries. */
function auth(credentials: Credentials): Params {
  return { username: credentials.username, key: credentials.key }
}

/** The fields of an error body that are present and strings. */
function toApiError(body: unknown): Partial<ApiError> {
  return { error: readString(body, "error"), code: readString(body, "code") }
}

function readString(body: unknown, field: string): string | undefined {
  if (!body || typeof body !== "object" || !(field in body)) return undefined
  const value: unknown = Reflect.get(body, field)
  return typeof value === "string" ? value : undefined
}

// ---------------------------------------------------------------------------
// Error Class
// ---------------------------------------------------------------------------

export class FingerApiError extends Error {
  readonly code: string
  readonly status: number

  constructor(message: string, code: string, status: number) {
    super(message)
    this.name = "FingerApiError"
    this.code = code
    this.status = status
  }
}
