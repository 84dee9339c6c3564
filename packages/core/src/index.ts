/**
 * @bridge-driver/core
 *
 * Settings, errors, logging, transport and shared types for the bridge driver
 */

// Config
export {
  defineSettings,
  OPERATION_REQUIREMENTS,
  type Operation,
  requireSetting,
  requireSettings,
  type SettingKey,
  type Settings,
  type SettingsFor,
  SettingsSchema,
} from "./config.js"
// Errors
export {
  BridgeError,
  type BridgeErrorCode,
  type BridgeErrorOptions,
  ConfigurationError,
  errorMessage,
  FinalizationTimeoutError,
  InvalidInputError,
  isBridgeError,
  LightClientLagError,
  ProofBuildError,
  ProofSerializeError,
  type RpcChain,
  RpcError,
} from "./errors.js"
// Logging
export { createLogger, type Logger, type LoggerConfig, type LogLevel } from "./logger.js"
// Transport
export {
  DEFAULT_RPC_TIMEOUT_MS,
  JsonRpcClient,
  type JsonRpcClientConfig,
  type JsonRpcErrorObject,
} from "./rpc.js"
// Types
export {
  type EvmUnsignedTransaction,
  type Hex,
  type NearAction,
  type NearUnsignedTransaction,
  type ReceiptProof,
  type StorageProof,
  type StorageSlotProof,
} from "./types.js"

// Byte utilities
export {
  bytesToHex,
  decodeCryptoHash,
  encodeCryptoHash,
  encodeJsonArgs,
  fromBase64,
  hexToBytes,
  hexToFixedBytes,
  isEvmAddress,
  parseEvmAddress,
  parseHash,
  parseJsonPreservingIntegers,
  toBase64,
} from "./utils/bytes.js"
// Polling
export { type PollOptions, pollUntil } from "./utils/poll.js"
