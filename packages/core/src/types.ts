/**
 * Core type definitions for the bridge driver
 */

export type Hex = `0x${string}`

// Unsigned transaction types for each chain

/**
 * EVM unsigned transaction, accepted as is by viem wallet clients.
 * Can be passed directly to walletClient.sendTransaction() or signer.sendTransaction()
 */
export interface EvmUnsignedTransaction {
  to: `0x${string}`
  data: `0x${string}`
  value: bigint
  chainId: number
}

export interface NearAction {
  type: "FunctionCall"
  methodName: string
  args: Uint8Array
  gas: bigint
  deposit: bigint
}

export interface NearUnsignedTransaction {
  type: "near"
  signerId: string
  receiverId: string
  actions: NearAction[]
}

// Proof records shared between the chain packages

/**
 * Inclusion proof of one log of one receipt in an EVM block.
 * Node and header encodings are RLP, exactly as the on-chain prover hashes them.
 */
export interface ReceiptProof {
  logIndex: bigint
  logEntryData: Uint8Array
  receiptIndex: bigint
  receiptData: Uint8Array
  headerData: Uint8Array
  proof: Uint8Array[]
}

export interface StorageSlotProof {
  key: Hex
  value: Hex
  proof: Hex[]
}

/**
 * Result of `eth_getProof` for one account and its requested storage slots
 */
export interface StorageProof {
  address: Hex
  balance: Hex
  codeHash: Hex
  nonce: Hex
  storageHash: Hex
  accountProof: Hex[]
  storageProof: StorageSlotProof[]
}
