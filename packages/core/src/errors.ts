/**
 * Error types for the bridge driver
 *
 * Every failure surfaced to callers is a BridgeError with a stable code.
 * Underlying failures are kept on `cause`.
 */

export type BridgeErrorCode =
  | "CONFIGURATION"
  | "EVM_RPC"
  | "NEAR_RPC"
  | "PROOF_BUILD"
  | "PROOF_SERIALIZE"
  | "LIGHT_CLIENT_LAG"
  | "FINALIZATION_TIMEOUT"
  | "INVALID_INPUT"

export interface BridgeErrorOptions {
  details?: Record<string, unknown>
  cause?: unknown
}

export class BridgeError extends Error {
  readonly code: BridgeErrorCode
  readonly details?: Record<string, unknown>

  constructor(message: string, code: BridgeErrorCode, options: BridgeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.name = "BridgeError"
    this.code = code
    this.details = options.details
  }
}

export class ConfigurationError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, "CONFIGURATION", options)
    this.name = "ConfigurationError"
  }
}

export type RpcChain = "evm" | "near"

export class RpcError extends BridgeError {
  constructor(
    message: string,
    public readonly chain: RpcChain,
    options?: BridgeErrorOptions,
  ) {
    super(message, chain === "evm" ? "EVM_RPC" : "NEAR_RPC", options)
    this.name = "RpcError"
  }
}

export class ProofBuildError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, "PROOF_BUILD", options)
    this.name = "ProofBuildError"
  }
}

export class ProofSerializeError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, "PROOF_SERIALIZE", options)
    this.name = "ProofSerializeError"
  }
}

/**
 * The proof references a block the destination light client has not synced yet.
 * Callers should wait for the light client and invoke the operation again.
 */
export class LightClientLagError extends BridgeError {
  constructor(
    public readonly requiredHeight: bigint,
    public readonly syncHeight: bigint,
    options?: BridgeErrorOptions,
  ) {
    super(
      `Light client is behind: proof needs height ${requiredHeight}, light client is at ${syncHeight}`,
      "LIGHT_CLIENT_LAG",
      options,
    )
    this.name = "LightClientLagError"
  }
}

export class FinalizationTimeoutError extends BridgeError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
    options?: BridgeErrorOptions,
  ) {
    super(message, "FINALIZATION_TIMEOUT", options)
    this.name = "FinalizationTimeoutError"
  }
}

export class InvalidInputError extends BridgeError {
  constructor(message: string, options?: BridgeErrorOptions) {
    super(message, "INVALID_INPUT", options)
    this.name = "InvalidInputError"
  }
}

export function isBridgeError(value: unknown, code?: BridgeErrorCode): value is BridgeError {
  return value instanceof BridgeError && (code === undefined || value.code === code)
}

/**
 * Human-readable message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
