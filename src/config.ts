// src/config.ts — Configuration loader from environment variables

import type { RegistrationPolicy } from "./presence/types.js"

export interface FingerdConfig {
  // Gateway
  port: number
  host: string

  // Persistence
  storage: StorageMode
  dataDir: string

  // Presence
  registration: RegistrationPolicy
  /** Online window granted by login and bump */
  onlineTtlMs: number

  // Scheduler
  sweepIntervalMs: number
}

const VALID_STORAGE_MODES = ["file", "memory"] as const
export type StorageMode = (typeof VALID_STORAGE_MODES)[number]

const VALID_REGISTRATION_MODES = ["open", "closed", "key"] as const
type RegistrationModeName = (typeof VALID_REGISTRATION_MODES)[number]

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((v) => v === value)
}

function parseStorageMode(value: string | undefined): StorageMode {
  const v = (value ?? "file").trim().toLowerCase()
  if (isOneOf(VALID_STORAGE_MODES, v)) return v
  throw new Error(`FINGERD_STORAGE must be one of ${VALID_STORAGE_MODES.join(", ")} (got "${value}")`)
}

function parseRegistration(mode: string | undefined, key: string | undefined): RegistrationPolicy {
  const v = (mode ?? "open").trim().toLowerCase()
  if (!isOneOf<RegistrationModeName>(VALID_REGISTRATION_MODES, v)) {
    throw new Error(`FINGERD_REGISTRATION must be one of ${VALID_REGISTRATION_MODES.join(", ")} (got "${mode}")`)
  }

  switch (v) {
    case "open":
      return { mode: "open" }
    case "closed":
      return { mode: "closed" }
    case "key":
      if (!key) {
        throw new Error("FINGERD_REGISTRATION_KEY is required when FINGERD_REGISTRATION=key")
      }
      return { mode: "key", key }
  }
}

/** Parse a positive integer from an environment variable, failing fast on NaN. */
function parseIntEnv(env: NodeJS.ProcessEnv, envKey: string, fallback: string): number {
  const raw = env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value) || value <= 0) {
    throw new Error(`${envKey} must be a positive integer (got "${raw}")`)
  }
  return value
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): FingerdConfig {
  const registration = parseRegistration(env.FINGERD_REGISTRATION, env.FINGERD_REGISTRATION_KEY)
  if (registration.mode === "open") {
    console.warn("[config] registration is open and no registration key is set: anybody can register")
  }

  return {
    port: parseIntEnv(env, "PORT", "6969"),
    host: env.HOST ?? "0.0.0.0",

    storage: parseStorageMode(env.FINGERD_STORAGE),
    dataDir: env.FINGERD_DATA_DIR ?? "./data",

    registration,
    onlineTtlMs: parseIntEnv(env, "FINGERD_ONLINE_TTL_MS", "3600000"),

    sweepIntervalMs: parseIntEnv(env, "FINGERD_SWEEP_INTERVAL_MS", "60000"),
  }
}
