/**
 * RLP encodings of EVM receipts, logs and block headers as the on-chain provers hash them
 */

import { RLP } from "@ethereumjs/rlp"
import type { EvmBlockHeader, EvmLog, EvmReceipt } from "./types.js"

// RLP encodes integer zero as the empty string
export function rlpQuantity(value: string): string {
  return /^0x0*$/.test(value) ? "0x" : value
}

export function getReceiptTypeNumber(type: string): number {
  return Number.parseInt(type, 16)
}

export function encodeLog(log: Pick<EvmLog, "address" | "topics" | "data">): Uint8Array {
  return RLP.encode([log.address, log.topics, log.data])
}

/**
 * Consensus encoding of a receipt.
 *
 * Legacy receipts are `RLP([status, cumulativeGasUsed, logsBloom, logs])`;
 * EIP-2718 receipts prefix that payload with their type byte.
 */
export function typedReceiptEncoding(receipt: EvmReceipt): Uint8Array {
  const items = [
    receipt.status === "0x1" ? "0x1" : "0x",
    rlpQuantity(receipt.cumulativeGasUsed),
    receipt.logsBloom,
    receipt.logs.map((log) => [log.address, log.topics, log.data]),
  ]

  const typeNumber = getReceiptTypeNumber(receipt.type)
  const payload = RLP.encode(items)
  if (typeNumber === 0) {
    return payload
  }

  const encoded = new Uint8Array(payload.length + 1)
  encoded[0] = typeNumber
  encoded.set(payload, 1)
  return encoded
}

export function encodeBlockHeader(header: EvmBlockHeader): Uint8Array {
  const items = [
    header.parentHash,
    header.sha3Uncles,
    header.miner,
    header.stateRoot,
    header.transactionsRoot,
    header.receiptsRoot,
    header.logsBloom,
    rlpQuantity(header.difficulty),
    rlpQuantity(header.number),
    rlpQuantity(header.gasLimit),
    rlpQuantity(header.gasUsed),
    rlpQuantity(header.timestamp),
    header.extraData,
    header.mixHash,
    header.nonce,
    header.baseFeePerGas === undefined ? undefined : rlpQuantity(header.baseFeePerGas),
    header.withdrawalsRoot,
    header.blobGasUsed === undefined ? undefined : rlpQuantity(header.blobGasUsed),
    header.excessBlobGas === undefined ? undefined : rlpQuantity(header.excessBlobGas),
    header.parentBeaconBlockRoot,
    header.requestsHash,
  ].filter((item): item is string => item !== undefined)

  return RLP.encode(items)
}
