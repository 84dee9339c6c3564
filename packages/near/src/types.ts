/**
 * NEAR-specific types for the bridge driver
 *
 * Zorsh schemas for Borsh serialization matching the on-chain contract format.
 */

import { hexToFixedBytes, InvalidInputError } from "@bridge-driver/core"
import { b } from "@zorsh/zorsh"
import { parseAmount, parseGas } from "near-kit"
import { z } from "zod"

// Gas constants (using near-kit for readability)
export const GAS = {
  DEFAULT: BigInt(parseGas("300 Tgas")),
  FT_TRANSFER_CALL: BigInt(parseGas("200 Tgas")),
  LP_UNLOCK: BigInt(parseGas("120 Tgas")),
  FAST_BRIDGE_WITHDRAW: BigInt(parseGas("20 Tgas")),
} as const

// Deposit constants
export const DEPOSIT = {
  NONE: 0n,
  ONE_YOCTO: BigInt(parseAmount("1 yocto")),
  LOG_METADATA: 200_000_000_000_000_000_000n,
  LOCKER_WITHDRAW: 60_000_000_000_000_000_000n,
  SIGN_TRANSFER: 500_000_000_000_000_000_000n,
} as const

/**
 * Receipt inclusion proof as the NEAR-side Ethereum prover reads it
 */
export const EthProofSchema = b.struct({
  log_index: b.u64(),
  log_entry_data: b.bytes(),
  receipt_index: b.u64(),
  receipt_data: b.bytes(),
  header_data: b.bytes(),
  proof: b.vec(b.bytes()),
})
export type EthProof = b.infer<typeof EthProofSchema>

/**
 * Arguments of the eth connector's `withdraw`
 */
export const WithdrawArgsSchema = b.struct({
  recipient_address: b.array(b.u8(), 20),
  amount: b.u128(),
})
export type WithdrawArgs = b.infer<typeof WithdrawArgsSchema>

/**
 * Fast bridge transfer message, sent base64 encoded as the `msg` of `ft_transfer_call`
 */
export const TransferMessageSchema = b.struct({
  valid_till: b.u64(),
  transfer: b.struct({
    token_near: b.string(),
    token_eth: b.array(b.u8(), 20),
    amount: b.u128(),
  }),
  fee: b.struct({
    token: b.string(),
    amount: b.u128(),
  }),
  recipient: b.array(b.u8(), 20),
  valid_till_block_height: b.option(b.u64()),
  aurora_sender: b.option(b.array(b.u8(), 20)),
})
export type TransferMessage = b.infer<typeof TransferMessageSchema>

/**
 * Storage proof of a fast bridge transfer slot, the argument of the locker's `unlock`
 */
export const UnlockProofSchema = b.struct({
  header_data: b.bytes(),
  account_proof: b.vec(b.bytes()),
  account_data: b.bytes(),
  storage_proof: b.vec(b.bytes()),
})
export type UnlockProof = b.infer<typeof UnlockProofSchema>

const decimalString = z.string().regex(/^\d+$/, "expected a decimal integer string")
const hexAddress = z.string().regex(/^(0x)?[0-9a-fA-F]{40}$/, "expected a 20-byte hex address")

/**
 * JSON view of a TransferMessage as returned by `get_pending_transfer`
 */
export const TransferMessageJsonSchema = z.object({
  valid_till: z.union([z.number().int().nonnegative(), decimalString]),
  transfer: z.object({
    token_near: z.string(),
    token_eth: hexAddress,
    amount: decimalString,
  }),
  fee: z.object({
    token: z.string(),
    amount: decimalString,
  }),
  recipient: hexAddress,
  valid_till_block_height: z.union([z.number().int().nonnegative(), decimalString]).nullish(),
  aurora_sender: hexAddress.nullish(),
})

export const PendingTransferJsonSchema = z.tuple([z.string(), TransferMessageJsonSchema])

/**
 * Transfer waiting on the fast bridge for an EVM payout or a refund
 */
export interface PendingTransfer {
  initiator: string
  message: TransferMessage
}

function address(value: string): number[] {
  return Array.from(hexToFixedBytes(value, 20, "address"))
}

/**
 * Parse the `get_pending_transfer` view result
 *
 * @throws {InvalidInputError} if the result does not describe a pending transfer
 */
export function parsePendingTransfer(value: unknown): PendingTransfer {
  const parsed = PendingTransferJsonSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidInputError("Malformed pending transfer", { details: { issues: parsed.error.issues } })
  }
  const [initiator, json] = parsed.data
  const heightLimit = json.valid_till_block_height
  return {
    initiator,
    message: {
      valid_till: BigInt(json.valid_till),
      transfer: {
        token_near: json.transfer.token_near,
        token_eth: address(json.transfer.token_eth),
        amount: BigInt(json.transfer.amount),
      },
      fee: { token: json.fee.token, amount: BigInt(json.fee.amount) },
      recipient: address(json.recipient),
      valid_till_block_height: heightLimit === null || heightLimit === undefined ? null : BigInt(heightLimit),
      aurora_sender: json.aurora_sender ? address(json.aurora_sender) : null,
    },
  }
}

export interface AffinePoint {
  affine_point: string
}

export interface Scalar {
  scalar: string
}

export interface MPCSignatureRaw {
  big_r: AffinePoint
  s: Scalar
  recovery_id: number
}

function fromHex(hex: string): Uint8Array {
  return new Uint8Array(hex.match(/.{1,2}/g)?.map((byte) => Number.parseInt(byte, 16)) || [])
}

/**
 * MPC signature class with toBytes() conversion
 */
export class MPCSignature {
  constructor(
    public big_r: AffinePoint,
    public s: Scalar,
    public recovery_id: number,
  ) {}

  /**
   * Convert signature to the 65-byte `r ∥ s ∥ v` form
   * @param forEvm - If true, adds 27 to recovery_id for EVM compatibility
   */
  toBytes(forEvm = false): Uint8Array {
    const bigRBytes = fromHex(this.big_r.affine_point)
    const sBytes = fromHex(this.s.scalar)
    const result = [...bigRBytes.slice(1), ...sBytes, this.recovery_id + (forEvm ? 27 : 0)]
    return new Uint8Array(result)
  }

  /**
   * Create from raw signature object from contract logs
   */
  static fromRaw(raw: MPCSignatureRaw): MPCSignature {
    return new MPCSignature(raw.big_r, raw.s, raw.recovery_id)
  }
}

/**
 * Payload the token locker signs in `sign_transfer`
 */
export interface SignedTransferPayload {
  nonce: string
  token: string
  amount: string
  recipient: string
  fee_recipient: string | null
}

/**
 * Sign transfer event from NEAR
 */
export interface SignTransferEvent {
  signature: MPCSignature
  message_payload: SignedTransferPayload
}
