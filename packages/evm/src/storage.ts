/**
 * Storage proofs of contract slots
 */

import { RLP } from "@ethereumjs/rlp"
import { type Hex, ProofBuildError, type StorageProof } from "@bridge-driver/core"
import { encodePacked, hexToBigInt, keccak256 } from "viem"
import { rlpQuantity } from "./receipt.js"
import type { EvmRpc } from "./rpc.js"

/**
 * Position of the pending transfers mapping in the fast bridge contract's storage layout.
 * Must follow the deployed contract build.
 */
export const STORAGE_SLOT_INDEX = 302n

export interface FastBridgeTransfer {
  token: Hex
  recipient: Hex
  nonce: bigint
  amount: bigint
}

/**
 * Storage key of a fast bridge transfer:
 * `keccak256(keccak256(token ∥ recipient ∥ be256(nonce) ∥ be256(amount)) ∥ be256(302))`
 */
export function fastBridgeTransferSlotKey(transfer: FastBridgeTransfer): Hex {
  const transferHash = keccak256(
    encodePacked(
      ["address", "address", "uint256", "uint256"],
      [transfer.token, transfer.recipient, transfer.nonce, transfer.amount],
    ),
  )
  return keccak256(encodePacked(["bytes32", "uint256"], [transferHash, STORAGE_SLOT_INDEX]))
}

/**
 * Fetch the storage proof of `slotKey` at `blockHeight`.
 * The proof is not verified locally; that is the destination contract's job.
 *
 * @throws {ProofBuildError} if the node returned no proof for the requested key
 */
export async function buildStorageProof(
  rpc: EvmRpc,
  address: string,
  slotKey: Hex,
  blockHeight: bigint,
): Promise<StorageProof> {
  const proof = await rpc.getProof(address, slotKey, blockHeight)

  const entry = proof.storageProof[0]
  if (!entry) {
    throw new ProofBuildError(`No storage proof returned for slot ${slotKey} at block ${blockHeight}`)
  }
  if (hexToBigInt(entry.key) !== hexToBigInt(slotKey)) {
    throw new ProofBuildError(`Storage proof key ${entry.key} does not match requested slot ${slotKey}`)
  }
  return proof
}

/**
 * Account leaf of the state trie: `RLP([nonce, balance, storageHash, codeHash])`
 */
export function encodeAccountData(proof: StorageProof): Uint8Array {
  return RLP.encode([
    rlpQuantity(proof.nonce),
    rlpQuantity(proof.balance),
    proof.storageHash,
    proof.codeHash,
  ])
}
