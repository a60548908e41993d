// src/presence/index.ts — barrel exports for the presence core

export { AccountStore } from "./account-store.js"
export { PresenceStore, isLive } from "./presence-store.js"
export { VisibilityLog } from "./visibility-log.js"
export { PresenceEngine } from "./engine.js"
export type { PresenceEngineDeps } from "./engine.js"
export { PresenceError, isPresenceError, authFailed, guardStore } from "./errors.js"
export type { PresenceErrorCode } from "./errors.js"
export { generateAuthKey, hashKey, safeCompare } from "./credentials.js"
export {
  ONLINE_TTL_MS,
  AccountSchema,
  PresenceRecordSchema,
  VisibilityEntrySchema,
  VisibilityListSchema,
} from "./types.js"
export type {
  Account,
  PresenceRecord,
  VisibilityEntry,
  EffectiveStatus,
  PresenceView,
  Registration,
  RegistrationPolicy,
  RegistrationMode,
} from "./types.js"
