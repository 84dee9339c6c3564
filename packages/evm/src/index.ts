/**
 * @bridge-driver/evm
 *
 * EVM side of the bridge driver: JSON-RPC gateway, receipt and storage proofs,
 * light client queries and unsigned transaction builders
 */

export {
  BRIDGE_TOKEN_FACTORY_ABI,
  BRIDGE_TOKEN_FACTORY_SIGNED_ABI,
  ERC20_ABI,
  ETH_CUSTODIAN_ABI,
  FAST_BRIDGE_ABI,
  NEAR_LIGHT_CLIENT_ABI,
} from "./abi.js"
export {
  type BridgeDeposit,
  createEvmBuilder,
  type EvmBuilder,
  type EvmBuilderConfig,
  type FastBridgeTransferTokens,
} from "./builder.js"
export { readAllowance, readNearToEthToken } from "./contracts.js"
export {
  findLogByTopic,
  type LogEntry,
  TRANSFER_TOKENS_EVENT_SIGNATURE,
  TRANSFER_TOKENS_TOPIC,
} from "./events.js"
export { createNearLightClient, type NearLightClient } from "./light-client.js"
export { buildReceiptProof, buildReceiptTrieProof, type ReceiptTrieProof } from "./proof.js"
export {
  encodeBlockHeader,
  encodeLog,
  getReceiptTypeNumber,
  rlpQuantity,
  typedReceiptEncoding,
} from "./receipt.js"
export { createEvmRpc, type EvmRpc, type WaitForReceiptOptions } from "./rpc.js"
export { createViemEvmSigner, type EvmSigner, type ViemEvmSignerConfig } from "./signer.js"
export {
  buildStorageProof,
  encodeAccountData,
  type FastBridgeTransfer,
  fastBridgeTransferSlotKey,
  STORAGE_SLOT_INDEX,
} from "./storage.js"
export {
  type EvmBlockHeader,
  EvmBlockHeaderSchema,
  type EvmLog,
  EvmLogSchema,
  type EvmReceipt,
  EvmReceiptSchema,
  type EvmTransactionStatus,
  StorageProofSchema,
} from "./types.js"
