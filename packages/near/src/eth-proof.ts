/**
 * Ethereum proofs as NEAR contracts take them
 */

import {
  errorMessage,
  hexToBytes,
  ProofSerializeError,
  type ReceiptProof,
  type StorageProof,
  toBase64,
} from "@bridge-driver/core"
import { type EthProof, EthProofSchema, type UnlockProof, UnlockProofSchema } from "./types.js"

export function toEthProof(proof: ReceiptProof): EthProof {
  return {
    log_index: proof.logIndex,
    log_entry_data: proof.logEntryData,
    receipt_index: proof.receiptIndex,
    receipt_data: proof.receiptData,
    header_data: proof.headerData,
    proof: proof.proof,
  }
}

export function serializeEthProof(proof: ReceiptProof): Uint8Array {
  try {
    return EthProofSchema.serialize(toEthProof(proof))
  } catch (error) {
    throw new ProofSerializeError(`Failed to serialize receipt proof: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}

export interface EthProofJson {
  log_index: number
  log_entry_data: number[]
  receipt_index: number
  receipt_data: number[]
  header_data: number[]
  proof: number[][]
}

/**
 * JSON form of a receipt proof, used by `lp_unlock`. Byte strings become number arrays.
 */
export function ethProofJson(proof: ReceiptProof): EthProofJson {
  return {
    log_index: Number(proof.logIndex),
    log_entry_data: Array.from(proof.logEntryData),
    receipt_index: Number(proof.receiptIndex),
    receipt_data: Array.from(proof.receiptData),
    header_data: Array.from(proof.headerData),
    proof: proof.proof.map((node) => Array.from(node)),
  }
}

/**
 * Pair an `eth_getProof` result with the RLP header and account record it is rooted in
 */
export function toUnlockProof(
  storage: StorageProof,
  headerData: Uint8Array,
  accountData: Uint8Array,
): UnlockProof {
  const [slot] = storage.storageProof
  if (!slot) {
    throw new ProofSerializeError(`Storage proof of ${storage.address} has no slot`)
  }
  return {
    header_data: headerData,
    account_proof: storage.accountProof.map((node) => hexToBytes(node)),
    account_data: accountData,
    storage_proof: slot.proof.map((node) => hexToBytes(node)),
  }
}

/**
 * Borsh, then base64: the `proof` argument of the fast bridge `unlock`
 */
export function encodeUnlockProof(proof: UnlockProof): string {
  try {
    return toBase64(UnlockProofSchema.serialize(proof))
  } catch (error) {
    throw new ProofSerializeError(`Failed to serialize unlock proof: ${errorMessage(error)}`, {
      cause: error,
    })
  }
}
