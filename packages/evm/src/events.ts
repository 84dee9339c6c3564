/**
 * EVM event signatures used by the bridge flows
 */

import type { Hex } from "@bridge-driver/core"

export const TRANSFER_TOKENS_EVENT_SIGNATURE =
  "TransferTokens(uint256,address,address,address,uint256,string,bytes32)"

/**
 * keccak256 of the fast bridge TransferTokens event signature
 */
export const TRANSFER_TOKENS_TOPIC: Hex =
  "0xed54b7aec45dbd5851e5b6484f6fbc0e5990e127a8f1eea7a1e113eba6bfacf9"

/**
 * Minimal log shape; viem receipts and gateway receipts both fit
 */
export interface LogEntry {
  topics: readonly string[]
}

/**
 * Index of the first log whose topic0 equals `topic`, or -1
 */
export function findLogByTopic(logs: readonly LogEntry[], topic: string): number {
  const wanted = topic.toLowerCase()
  return logs.findIndex((log) => log.topics[0]?.toLowerCase() === wanted)
}
