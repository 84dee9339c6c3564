import type { Hex } from "@bridge-driver/core"
import type { EvmBlockHeader, EvmLog, EvmReceipt } from "../src/types.js"

export const ZERO_BLOOM: Hex = `0x${"00".repeat(256)}`
export const BLOCK_HASH: Hex = `0x${"bb".repeat(32)}`
export const CUSTODIAN: Hex = "0x1111111111111111111111111111111111111111"

export function hash(byte: string): Hex {
  return `0x${byte.repeat(32)}`
}

export function log(address: Hex, topics: Hex[], data: Hex, logIndex: Hex): EvmLog {
  return { address, topics, data, logIndex }
}

export function receipt(
  transactionIndex: number,
  options: { type?: Hex; logs?: EvmLog[]; cumulativeGasUsed?: Hex; status?: Hex } = {},
): EvmReceipt {
  return {
    transactionHash: hash((transactionIndex + 1).toString(16).padStart(2, "0")),
    transactionIndex: `0x${transactionIndex.toString(16)}`,
    blockHash: BLOCK_HASH,
    blockNumber: "0x64",
    type: options.type ?? "0x2",
    status: options.status ?? "0x1",
    cumulativeGasUsed: options.cumulativeGasUsed ?? `0x${(21_000 * (transactionIndex + 1)).toString(16)}`,
    logsBloom: ZERO_BLOOM,
    logs: options.logs ?? [],
  }
}

export function header(receiptsRoot: Hex, overrides: Partial<EvmBlockHeader> = {}): EvmBlockHeader {
  return {
    hash: BLOCK_HASH,
    parentHash: hash("aa"),
    sha3Uncles: "0x1dcc4de8dec75d7aab85b567b6ccd41ad312451b948a7413f0a142fd40d49347",
    miner: "0x0000000000000000000000000000000000000000",
    stateRoot: hash("cc"),
    transactionsRoot: hash("dd"),
    receiptsRoot,
    logsBloom: ZERO_BLOOM,
    difficulty: "0x0",
    number: "0x64",
    gasLimit: "0x1c9c380",
    gasUsed: "0xa410",
    timestamp: "0x65f0a000",
    extraData: "0x",
    mixHash: hash("ee"),
    nonce: "0x0000000000000000",
    baseFeePerGas: "0x7",
    withdrawalsRoot: "0x56e81f171bcc55a6ff8345e692c0f86e5b48e01b996cadc001622fb5e363b421",
    ...overrides,
  }
}
