/**
 * General utility helpers for stepwarden
 */

import { createHash, randomBytes } from 'node:crypto'

/**
 * Format a duration in milliseconds to a human-readable string
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  if (ms < 3600000) {
    const minutes = Math.floor(ms / 60000)
    const seconds = Math.floor((ms % 60000) / 1000)
    return `${String(minutes)}m ${String(seconds)}s`
  }
  const hours = Math.floor(ms / 3600000)
  const minutes = Math.floor((ms % 3600000) / 60000)
  return `${String(hours)}h ${String(minutes)}m`
}

/**
 * Generate a short random identifier (8 hex characters).
 * Used for process and task ids, which show up in branch names and CLI output.
 */
export function generateShortId(): string {
  return randomBytes(4).toString('hex')
}

/**
 * Stable fingerprint of a prompt: the first 16 hex characters of its SHA-256.
 */
export function promptHash(prompt: string): string {
  return createHash('sha256').update(prompt, 'utf8').digest('hex').slice(0, 16)
}

/** Current time as an ISO-8601 string */
export function nowIso(): string {
  return new Date().toISOString()
}

/**
 * Check if a value is a plain object (not an array, Date, or other special object)
 * @param value - Value to check
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
