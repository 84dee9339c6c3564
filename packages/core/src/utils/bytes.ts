import { base58, base64, hex } from "@scure/base"
import { InvalidInputError } from "../errors.js"
import type { Hex } from "../types.js"

export function hexToBytes(value: string): Uint8Array {
  const stripped = value.startsWith("0x") ? value.slice(2) : value
  try {
    return hex.decode(stripped.length % 2 === 0 ? stripped.toLowerCase() : `0${stripped.toLowerCase()}`)
  } catch (error) {
    throw new InvalidInputError(`Invalid hex string: ${value}`, { cause: error })
  }
}

export function bytesToHex(bytes: Uint8Array): Hex {
  return `0x${hex.encode(bytes)}`
}

/**
 * Decode a hex string that must be exactly `length` bytes long
 */
export function hexToFixedBytes(value: string, length: number, what = "value"): Uint8Array {
  const bytes = hexToBytes(value)
  if (bytes.length !== length) {
    throw new InvalidInputError(`Invalid ${what}: expected ${length} bytes, got ${bytes.length}`)
  }
  return bytes
}

function isHash(value: string): value is Hex {
  return /^0x[0-9a-fA-F]{64}$/.test(value)
}

export function isEvmAddress(value: string): value is Hex {
  return /^0x[0-9a-fA-F]{40}$/.test(value)
}

/**
 * Validate a user supplied 32-byte hex hash
 */
export function parseHash(value: string, what = "hash"): Hex {
  if (!isHash(value)) {
    throw new InvalidInputError(`Invalid ${what}: ${value}`)
  }
  return value
}

export function parseEvmAddress(value: string, what = "address"): Hex {
  if (!isEvmAddress(value)) {
    throw new InvalidInputError(`Invalid ${what}: ${value}`)
  }
  return value
}

/**
 * Decode a base58 NEAR crypto hash (receipt id, block hash)
 */
export function decodeCryptoHash(value: string, what = "hash"): Uint8Array {
  let bytes: Uint8Array
  try {
    bytes = base58.decode(value)
  } catch (error) {
    throw new InvalidInputError(`Invalid ${what}: ${value}`, { cause: error })
  }
  if (bytes.length !== 32) {
    throw new InvalidInputError(`Invalid ${what}: expected 32 bytes, got ${bytes.length}`)
  }
  return bytes
}

export function encodeCryptoHash(bytes: Uint8Array | readonly number[]): string {
  return base58.encode(Uint8Array.from(bytes))
}

export function toBase64(bytes: Uint8Array): string {
  return base64.encode(bytes)
}

export function fromBase64(value: string): Uint8Array {
  try {
    return base64.decode(value)
  } catch (error) {
    throw new InvalidInputError("Invalid base64 payload", { cause: error })
  }
}

/**
 * Encode args as JSON bytes
 */
export function encodeJsonArgs(args: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(args))
}

const JSON_STRING_OR_NUMBER = /"(?:[^"\\]|\\.)*"|-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/g

/**
 * Parse JSON, reading integers outside the safe range of a double as decimal strings.
 * NEAR contracts serialize u64 fields as plain JSON numbers.
 */
export function parseJsonPreservingIntegers(text: string): unknown {
  const quoted = text.replace(JSON_STRING_OR_NUMBER, (token) =>
    /^-?\d+$/.test(token) && !Number.isSafeInteger(Number(token)) ? `"${token}"` : token,
  )
  return JSON.parse(quoted)
}
