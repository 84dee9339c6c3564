/**
 * @bridge-driver/near
 *
 * NEAR side of the bridge driver: JSON-RPC gateway, light client proofs,
 * Borsh argument schemas and unsigned transaction builders
 */

export { createNearBuilder, type FastBridgeWithdrawParams, type NearBuilder } from "./builder.js"
export {
  encodeUnlockProof,
  type EthProofJson,
  ethProofJson,
  serializeEthProof,
  toEthProof,
  toUnlockProof,
} from "./eth-proof.js"
export { findSignTransferEvent, parseSignTransferEvent } from "./events.js"
export {
  deserializeNearProof,
  LightClientExecutionProofSchema,
  MerklePathDirection,
  type NearExecutionProof,
  normalizeLightClientProof,
  proofBlockHeight,
  type RawLightClientProof,
  RawLightClientProofSchema,
  serializeNearProof,
} from "./proof.js"
export {
  createNearRpc,
  type NearRpc,
  type NearTxStatus,
  type ReceiptRef,
  TxStatusSchema,
  type WaitForOutcomeOptions,
} from "./rpc.js"
export { toNearKitTransaction } from "./shims.js"
export { createNearKitSigner, type NearSigner } from "./signer.js"
export {
  type AffinePoint,
  DEPOSIT,
  type EthProof,
  EthProofSchema,
  GAS,
  MPCSignature,
  type MPCSignatureRaw,
  parsePendingTransfer,
  type PendingTransfer,
  PendingTransferJsonSchema,
  type Scalar,
  type SignedTransferPayload,
  type SignTransferEvent,
  type TransferMessage,
  TransferMessageJsonSchema,
  TransferMessageSchema,
  type UnlockProof,
  UnlockProofSchema,
  type WithdrawArgs,
  WithdrawArgsSchema,
} from "./types.js"
