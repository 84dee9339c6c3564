/**
 * EVM JSON-RPC response shapes
 *
 * Quantities stay as the hex strings the node sent, so that RLP encoding
 * reproduces the byte lengths used on the wire.
 */

import type { Hex } from "@bridge-driver/core"
import { z } from "zod"

function hexMatching(pattern: RegExp, message: string) {
  return z.custom<Hex>((value) => typeof value === "string" && pattern.test(value), { message })
}

export const QuantitySchema = hexMatching(/^0x[0-9a-fA-F]+$/, "expected a hex quantity")
export const DataSchema = hexMatching(/^0x([0-9a-fA-F]{2})*$/, "expected hex data")
export const HashSchema = hexMatching(/^0x[0-9a-fA-F]{64}$/, "expected a 32-byte hash")
export const AddressSchema = hexMatching(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte address")
export const BloomSchema = hexMatching(/^0x[0-9a-fA-F]{512}$/, "expected a 256-byte logs bloom")

export const EvmBlockHeaderSchema = z.object({
  hash: HashSchema,
  parentHash: HashSchema,
  sha3Uncles: HashSchema,
  miner: AddressSchema,
  stateRoot: HashSchema,
  transactionsRoot: HashSchema,
  receiptsRoot: HashSchema,
  logsBloom: BloomSchema,
  difficulty: QuantitySchema,
  number: QuantitySchema,
  gasLimit: QuantitySchema,
  gasUsed: QuantitySchema,
  timestamp: QuantitySchema,
  extraData: DataSchema,
  mixHash: HashSchema,
  nonce: DataSchema,
  // London and later
  baseFeePerGas: QuantitySchema.optional(),
  // Shanghai and later
  withdrawalsRoot: HashSchema.optional(),
  // Cancun and later
  blobGasUsed: QuantitySchema.optional(),
  excessBlobGas: QuantitySchema.optional(),
  parentBeaconBlockRoot: HashSchema.optional(),
  // Prague and later
  requestsHash: HashSchema.optional(),
})
export type EvmBlockHeader = z.infer<typeof EvmBlockHeaderSchema>

export const EvmLogSchema = z.object({
  address: AddressSchema,
  topics: z.array(HashSchema),
  data: DataSchema,
  logIndex: QuantitySchema,
})
export type EvmLog = z.infer<typeof EvmLogSchema>

export const EvmReceiptSchema = z.object({
  transactionHash: HashSchema,
  transactionIndex: QuantitySchema,
  blockHash: HashSchema,
  blockNumber: QuantitySchema,
  // Pre-Berlin nodes omit the type of legacy receipts
  type: QuantitySchema.default("0x0"),
  status: QuantitySchema,
  cumulativeGasUsed: QuantitySchema,
  logsBloom: BloomSchema,
  logs: z.array(EvmLogSchema),
})
export type EvmReceipt = z.infer<typeof EvmReceiptSchema>

export const StorageProofSchema = z.object({
  address: AddressSchema,
  balance: QuantitySchema,
  codeHash: HashSchema,
  nonce: QuantitySchema,
  storageHash: HashSchema,
  accountProof: z.array(DataSchema),
  storageProof: z.array(
    z.object({
      key: QuantitySchema,
      value: QuantitySchema,
      proof: z.array(DataSchema),
    }),
  ),
})

export interface EvmTransactionStatus {
  transactionHash: Hex
  blockNumber: bigint
  status: "success" | "reverted"
}
