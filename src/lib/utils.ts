import { getRandomValues } from "node:crypto"

/**
 * Generates a random string using A-Za-z0-9 characters
 * @returns A random string of `length` characters
 */
const ALPHA = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789"
export const generateUniqueId = (length: number = 12): string => {
  const bytes = getRandomValues(new Uint8Array(length))
  return Array.from(bytes, (b) => ALPHA[b % ALPHA.length]).join("")
}

// Per-process random prefix plus a counter: ids never repeat within a process
const sessionPrefix = generateUniqueId(6)
let sequence = 0
export const nextId = (): string => {
  sequence += 1
  return `${sessionPrefix}${sequence.toString(36).padStart(4, "0")}`
}

export function assert(condition: unknown, msg?: string): asserts condition {
  if (!condition) {
    throw new Error(msg)
  }
}

const ForbiddenFileNameChars = /[/\\?%*:|"<>.]/g

/**
 * Replace characters that are unsafe or ambiguous in a file name with `_`
 */
export const sanitizeFileName = (name: string): string => name.trim().replace(ForbiddenFileNameChars, "_")

const ByteUnits = ["B", "KB", "MB", "GB", "TB", "PB"] as const

/**
 * Render a byte count with two decimals in the largest unit that keeps it above 1
 */
export const formatByteSize = (bytes: number): string => {
  let value = bytes
  let unit = 0
  while (value >= 1024 && unit < ByteUnits.length - 1) {
    value /= 1024
    unit += 1
  }
  return `${value.toFixed(2)} ${ByteUnits[unit]}`
}
