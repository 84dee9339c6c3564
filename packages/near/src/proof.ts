/**
 * NEAR light client execution proofs
 *
 * The `light_client_proof` RPC result carries fields the EVM-side verifier does not
 * accept. The canonical record drops `outcome.metadata` and `inner_lite.timestamp`
 * and keeps every other field in its original order.
 */

import {
  decodeCryptoHash,
  errorMessage,
  fromBase64,
  ProofBuildError,
  ProofSerializeError,
} from "@bridge-driver/core"
import { b } from "@zorsh/zorsh"
import { z } from "zod"

export enum MerklePathDirection {
  Left = 0,
  Right = 1,
}

const CryptoHashSchema = b.array(b.u8(), 32)

const MerklePathSchema = b.vec(
  b.struct({
    hash: CryptoHashSchema,
    direction: b.nativeEnum(MerklePathDirection),
  }),
)

// The verifier only accepts successful outcomes; Failure keeps its tag position
const ExecutionStatusSchema = b.enum({
  Unknown: b.struct({}),
  Failure: b.struct({}),
  SuccessValue: b.bytes(),
  SuccessReceiptId: CryptoHashSchema,
})

export const LightClientExecutionProofSchema = b.struct({
  outcome_proof: b.struct({
    proof: MerklePathSchema,
    block_hash: CryptoHashSchema,
    id: CryptoHashSchema,
    outcome: b.struct({
      logs: b.vec(b.string()),
      receipt_ids: b.vec(CryptoHashSchema),
      gas_burnt: b.u64(),
      tokens_burnt: b.u128(),
      executor_id: b.string(),
      status: ExecutionStatusSchema,
    }),
  }),
  outcome_root_proof: MerklePathSchema,
  block_header_lite: b.struct({
    prev_block_hash: CryptoHashSchema,
    inner_rest_hash: CryptoHashSchema,
    inner_lite: b.struct({
      height: b.u64(),
      epoch_id: CryptoHashSchema,
      next_epoch_id: CryptoHashSchema,
      prev_state_root: CryptoHashSchema,
      outcome_root: CryptoHashSchema,
      timestamp_nanosec: b.u64(),
      next_bp_hash: CryptoHashSchema,
      block_merkle_root: CryptoHashSchema,
    }),
  }),
  block_proof: MerklePathSchema,
})

/**
 * Canonical execution proof consumed by the NEAR light client verifier on EVM
 */
export type NearExecutionProof = b.infer<typeof LightClientExecutionProofSchema>

// Raw `light_client_proof` RPC result

const Base58HashSchema = z.string().min(32).max(44)
const IntegerSchema = z.union([z.number().int().nonnegative(), z.string().regex(/^\d+$/)])

const RawMerklePathSchema = z.array(
  z.object({
    hash: Base58HashSchema,
    direction: z.enum(["Left", "Right"]),
  }),
)

const RawExecutionStatusSchema = z.union([
  z.literal("Unknown"),
  z.object({ SuccessValue: z.string() }),
  z.object({ SuccessReceiptId: Base58HashSchema }),
  z.object({ Failure: z.object({}).passthrough() }),
])

export const RawLightClientProofSchema = z.object({
  outcome_proof: z.object({
    proof: RawMerklePathSchema,
    block_hash: Base58HashSchema,
    id: Base58HashSchema,
    outcome: z.object({
      logs: z.array(z.string()),
      receipt_ids: z.array(Base58HashSchema),
      gas_burnt: IntegerSchema,
      tokens_burnt: IntegerSchema,
      executor_id: z.string(),
      status: RawExecutionStatusSchema,
    }),
  }),
  outcome_root_proof: RawMerklePathSchema,
  block_header_lite: z.object({
    prev_block_hash: Base58HashSchema,
    inner_rest_hash: Base58HashSchema,
    inner_lite: z.object({
      height: IntegerSchema,
      epoch_id: Base58HashSchema,
      next_epoch_id: Base58HashSchema,
      prev_state_root: Base58HashSchema,
      outcome_root: Base58HashSchema,
      timestamp_nanosec: IntegerSchema,
      next_bp_hash: Base58HashSchema,
      block_merkle_root: Base58HashSchema,
    }),
  }),
  block_proof: RawMerklePathSchema,
})
export type RawLightClientProof = z.infer<typeof RawLightClientProofSchema>

type RawMerklePath = z.infer<typeof RawMerklePathSchema>
type RawExecutionStatus = z.infer<typeof RawExecutionStatusSchema>
type ExecutionStatus = NearExecutionProof["outcome_proof"]["outcome"]["status"]

function hash(value: string): number[] {
  return Array.from(decodeCryptoHash(value))
}

function merklePath(path: RawMerklePath): NearExecutionProof["outcome_root_proof"] {
  return path.map((item) => ({
    hash: hash(item.hash),
    direction: item.direction === "Left" ? MerklePathDirection.Left : MerklePathDirection.Right,
  }))
}

function executionStatus(status: RawExecutionStatus): ExecutionStatus {
  if (status === "Unknown") {
    return { Unknown: {} }
  }
  if ("Failure" in status) {
    throw new ProofBuildError("Execution outcome failed; a failed receipt cannot be proven", {
      details: { failure: status.Failure },
    })
  }
  if ("SuccessValue" in status) {
    return { SuccessValue: fromBase64(status.SuccessValue) }
  }
  return { SuccessReceiptId: hash(status.SuccessReceiptId) }
}

/**
 * Convert a `light_client_proof` RPC result into the canonical proof record
 *
 * @throws {ProofBuildError} if the result is malformed or describes a failed outcome
 */
export function normalizeLightClientProof(raw: unknown): NearExecutionProof {
  const parsed = RawLightClientProofSchema.safeParse(raw)
  if (!parsed.success) {
    throw new ProofBuildError("Malformed light client proof", {
      details: { issues: parsed.error.issues },
      cause: parsed.error,
    })
  }
  const { outcome_proof, outcome_root_proof, block_header_lite, block_proof } = parsed.data
  const { outcome } = outcome_proof
  const { inner_lite } = block_header_lite

  return {
    outcome_proof: {
      proof: merklePath(outcome_proof.proof),
      block_hash: hash(outcome_proof.block_hash),
      id: hash(outcome_proof.id),
      outcome: {
        logs: outcome.logs,
        receipt_ids: outcome.receipt_ids.map(hash),
        gas_burnt: BigInt(outcome.gas_burnt),
        tokens_burnt: BigInt(outcome.tokens_burnt),
        executor_id: outcome.executor_id,
        status: executionStatus(outcome.status),
      },
    },
    outcome_root_proof: merklePath(outcome_root_proof),
    block_header_lite: {
      prev_block_hash: hash(block_header_lite.prev_block_hash),
      inner_rest_hash: hash(block_header_lite.inner_rest_hash),
      inner_lite: {
        height: BigInt(inner_lite.height),
        epoch_id: hash(inner_lite.epoch_id),
        next_epoch_id: hash(inner_lite.next_epoch_id),
        prev_state_root: hash(inner_lite.prev_state_root),
        outcome_root: hash(inner_lite.outcome_root),
        timestamp_nanosec: BigInt(inner_lite.timestamp_nanosec),
        next_bp_hash: hash(inner_lite.next_bp_hash),
        block_merkle_root: hash(inner_lite.block_merkle_root),
      },
    },
    block_proof: merklePath(block_proof),
  }
}

export function serializeNearProof(proof: NearExecutionProof): Uint8Array {
  try {
    return LightClientExecutionProofSchema.serialize(proof)
  } catch (error) {
    throw new ProofSerializeError(`Failed to serialize light client proof: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}

export function deserializeNearProof(bytes: Uint8Array): NearExecutionProof {
  try {
    return LightClientExecutionProofSchema.deserialize(bytes)
  } catch (error) {
    throw new ProofSerializeError(`Failed to decode light client proof: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}

/**
 * Height of the NEAR block the proof is rooted in
 */
export function proofBlockHeight(proof: NearExecutionProof): bigint {
  return proof.block_header_lite.inner_lite.height
}
