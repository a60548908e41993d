// packages/finger-sdk/src/index.ts — Barrel Export

export { FingerClient, FingerApiError } from "./client.js"

export type {
  FingerClientConfig,
  Credentials,
  RegisterResponse,
  Presence,
  ActionResponse,
  ListResponse,
  Checker,
  CheckResponse,
  HealthResponse,
  ApiError,
} from "./types.js"
