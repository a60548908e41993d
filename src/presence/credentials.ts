// src/presence/credentials.ts — Auth key generation and constant-time comparison

import { createHash, randomBytes, timingSafeEqual } from "node:crypto"

const KEY_BYTES = 24

/** URL-safe so it can travel as a query parameter unescaped. */
export function generateAuthKey(): string {
  return randomBytes(KEY_BYTES).toString("base64url")
}

export function hashKey(key: string): string {
  return createHash("sha256").update(key).digest("hex")
}

/** Compare two SHA-256 hex digests in constant time. */
export function digestsEqual(a: string, b: string): boolean {
  const bufA = Buffer.from(a, "hex")
  const bufB = Buffer.from(b, "hex")
  if (bufA.length !== bufB.length) return false
  return timingSafeEqual(bufA, bufB)
}

/** Timing-safe string comparison (constant-time even for different lengths) */
export function safeCompare(a: string, b: string): boolean {
  return digestsEqual(hashKey(a), hashKey(b))
}
