/**
 * Receipt inclusion proofs for cross-chain verification
 */

import { createMerkleProof, createMPT } from "@ethereumjs/mpt"
import { RLP } from "@ethereumjs/rlp"
import { bytesToHex, MapDB } from "@ethereumjs/util"
import {
  createLogger,
  errorMessage,
  InvalidInputError,
  ProofBuildError,
  type ReceiptProof,
} from "@bridge-driver/core"
import { encodeBlockHeader, encodeLog, typedReceiptEncoding } from "./receipt.js"
import type { EvmRpc } from "./rpc.js"
import type { EvmReceipt } from "./types.js"

const logger = createLogger("receipt-proof")

export interface ReceiptTrieProof {
  root: Uint8Array
  proof: Uint8Array[]
}

/**
 * Build the receipts trie of a block and extract the path to one receipt.
 * Receipts are inserted in block order under `RLP(transactionIndex)`.
 */
export async function buildReceiptTrieProof(
  receipts: readonly EvmReceipt[],
  receiptIndex: number,
): Promise<ReceiptTrieProof> {
  const trie = await createMPT({ db: new MapDB() })

  for (const receipt of receipts) {
    const key = RLP.encode(Number.parseInt(receipt.transactionIndex, 16))
    await trie.put(key, typedReceiptEncoding(receipt))
  }

  const proof = await createMerkleProof(trie, RLP.encode(receiptIndex))
  return { root: trie.root(), proof }
}

/**
 * Build the proof that log `logIndex` of the receipt of `txHash` is part of its block.
 *
 * @param logIndex - position of the log within the transaction's receipt
 * @throws {InvalidInputError} if the log index is outside the receipt's logs
 * @throws {ProofBuildError} if the rebuilt receipts root differs from the header's
 */
export async function buildReceiptProof(
  rpc: EvmRpc,
  txHash: string,
  logIndex: number,
): Promise<ReceiptProof> {
  const receipt = await rpc.getTransactionReceipt(txHash)

  if (!Number.isInteger(logIndex) || logIndex < 0 || logIndex >= receipt.logs.length) {
    throw new InvalidInputError(
      `Log index ${logIndex} is out of range: receipt of ${txHash} has ${receipt.logs.length} logs`,
    )
  }
  const log = receipt.logs[logIndex]
  if (!log) {
    throw new InvalidInputError(`Log ${logIndex} not found in receipt of ${txHash}`)
  }

  const blockNumber = BigInt(receipt.blockNumber)
  const receiptIndex = Number.parseInt(receipt.transactionIndex, 16)

  const [header, blockReceipts] = await Promise.all([
    rpc.getBlockByNumber(blockNumber),
    rpc.getBlockReceipts(blockNumber),
  ])

  const target = blockReceipts.find((r) => r.transactionIndex === receipt.transactionIndex)
  if (!target) {
    throw new ProofBuildError(`Receipt ${receiptIndex} missing from block ${blockNumber} receipts`)
  }

  let trieProof: ReceiptTrieProof
  try {
    trieProof = await buildReceiptTrieProof(blockReceipts, receiptIndex)
  } catch (error) {
    throw new ProofBuildError(`Failed to build receipts trie: ${errorMessage(error)}`, { cause: error })
  }

  const root = bytesToHex(trieProof.root)
  if (root.toLowerCase() !== header.receiptsRoot.toLowerCase()) {
    throw new ProofBuildError(
      `Receipts root mismatch in block ${blockNumber}: computed ${root}, header has ${header.receiptsRoot}`,
      { details: { blockNumber: blockNumber.toString(), computed: root, expected: header.receiptsRoot } },
    )
  }

  logger.debug("built receipt proof", {
    txHash,
    blockNumber: blockNumber.toString(),
    receiptIndex,
    logIndex,
    nodes: trieProof.proof.length,
  })

  return {
    logIndex: BigInt(logIndex),
    logEntryData: encodeLog(log),
    receiptIndex: BigInt(receiptIndex),
    receiptData: typedReceiptEncoding(target),
    headerData: encodeBlockHeader(header),
    proof: trieProof.proof,
  }
}
