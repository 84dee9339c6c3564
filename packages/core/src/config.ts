/**
 * Driver settings and per-operation requirements
 */

import { z } from "zod"
import { ConfigurationError } from "./errors.js"
import type { Hex } from "./types.js"

const evmAddress = z.custom<Hex>(
  (value) => typeof value === "string" && /^0x[0-9a-fA-F]{40}$/.test(value),
  { message: "expected a 20-byte hex address" },
)

const evmPrivateKey = z.custom<Hex>(
  (value) => typeof value === "string" && /^0x[0-9a-fA-F]{64}$/.test(value),
  { message: "expected a 32-byte hex private key" },
)

const nearPrivateKey = z.custom<`ed25519:${string}`>(
  (value) =>
    typeof value === "string" && /^ed25519:[1-9A-HJ-NP-Za-km-z]+$/.test(value),
  { message: "expected an ed25519: prefixed base58 key" },
)

const nearAccountId = z
  .string()
  .min(2)
  .max(64)
  .regex(/^(([a-z\d]+[-_])*[a-z\d]+\.)*([a-z\d]+[-_])*[a-z\d]+$/, "invalid NEAR account id")

export const SettingsSchema = z
  .object({
    evmRpcUrl: z.string().url(),
    evmChainId: z.number().int().positive(),
    evmPrivateKey: evmPrivateKey,
    nearRpcUrl: z.string().url(),
    nearNetwork: z.enum(["mainnet", "testnet"]),
    nearSignerId: nearAccountId,
    nearPrivateKey: nearPrivateKey,
    ethCustodianAddress: evmAddress,
    ethConnectorAccountId: nearAccountId,
    bridgeTokenFactoryAddress: evmAddress,
    tokenLockerId: nearAccountId,
    nearLightClientAddress: evmAddress,
    fastBridgeAddress: evmAddress,
    fastBridgeAccountId: nearAccountId,
  })
  .partial()
  .strict()

export type Settings = Readonly<z.infer<typeof SettingsSchema>>
export type SettingKey = keyof Settings

const SETTING_LABELS: Record<SettingKey, string> = {
  evmRpcUrl: "Ethereum rpc endpoint",
  evmChainId: "Ethereum chain id",
  evmPrivateKey: "Ethereum private key",
  nearRpcUrl: "Near rpc endpoint",
  nearNetwork: "Near network",
  nearSignerId: "Near signer account id",
  nearPrivateKey: "Near private key",
  ethCustodianAddress: "Eth custodian address",
  ethConnectorAccountId: "Eth connector account id",
  bridgeTokenFactoryAddress: "Bridge token factory address",
  tokenLockerId: "Token locker account id",
  nearLightClientAddress: "Near light client address",
  fastBridgeAddress: "Fast bridge address",
  fastBridgeAccountId: "Fast bridge account id",
}

/**
 * Validate raw settings and freeze them.
 *
 * @throws {ConfigurationError} naming the first malformed field
 */
export function defineSettings(input: unknown): Settings {
  const parsed = SettingsSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue?.path.join(".") || "settings"
    throw new ConfigurationError(`Invalid setting "${field}": ${issue?.message ?? "malformed"}`, {
      details: { issues: parsed.error.issues },
    })
  }
  return Object.freeze(parsed.data)
}

/**
 * Settings each operation needs before it touches the network.
 * Gateways and signers are resolved from these fields unless injected directly.
 */
export const OPERATION_REQUIREMENTS = {
  "ethConnector.depositToNear": ["evmRpcUrl", "ethCustodianAddress"],
  "ethConnector.depositToEvm": ["evmRpcUrl", "ethCustodianAddress"],
  "ethConnector.finalizeDeposit": ["evmRpcUrl", "nearRpcUrl", "ethConnectorAccountId"],
  "ethConnector.withdraw": ["nearRpcUrl", "ethConnectorAccountId"],
  "ethConnector.finalizeWithdraw": [
    "evmRpcUrl",
    "nearRpcUrl",
    "ethCustodianAddress",
    "ethConnectorAccountId",
    "nearLightClientAddress",
  ],
  "nep141.logMetadata": ["nearRpcUrl", "tokenLockerId"],
  "nep141.storageDeposit": ["nearRpcUrl", "tokenLockerId"],
  "nep141.deployToken": [
    "evmRpcUrl",
    "nearRpcUrl",
    "tokenLockerId",
    "bridgeTokenFactoryAddress",
    "nearLightClientAddress",
  ],
  "nep141.deposit": ["nearRpcUrl", "tokenLockerId"],
  "nep141.finalizeDeposit": [
    "evmRpcUrl",
    "nearRpcUrl",
    "tokenLockerId",
    "bridgeTokenFactoryAddress",
    "nearLightClientAddress",
  ],
  "nep141.withdraw": ["evmRpcUrl", "bridgeTokenFactoryAddress"],
  "nep141.finalizeWithdraw": ["evmRpcUrl", "nearRpcUrl", "tokenLockerId"],
  "nep141.signTransfer": ["nearRpcUrl", "tokenLockerId"],
  "nep141.finalizeDepositSigned": ["evmRpcUrl", "nearRpcUrl", "bridgeTokenFactoryAddress"],
  "nep141.claimFee": ["evmRpcUrl", "nearRpcUrl", "tokenLockerId"],
  "fastBridge.transfer": ["nearRpcUrl", "fastBridgeAccountId"],
  "fastBridge.getPendingTransfer": ["nearRpcUrl", "fastBridgeAccountId"],
  "fastBridge.completeTransferOnEvm": ["evmRpcUrl", "nearRpcUrl", "fastBridgeAddress", "fastBridgeAccountId"],
  "fastBridge.lpUnlock": ["evmRpcUrl", "nearRpcUrl", "fastBridgeAccountId"],
  "fastBridge.unlock": ["evmRpcUrl", "nearRpcUrl", "fastBridgeAddress", "fastBridgeAccountId"],
  "fastBridge.withdraw": ["nearRpcUrl", "fastBridgeAccountId"],
} as const satisfies Record<string, readonly SettingKey[]>

export type Operation = keyof typeof OPERATION_REQUIREMENTS

export type SettingsFor<O extends Operation> = Settings &
  Required<Pick<Settings, (typeof OPERATION_REQUIREMENTS)[O][number]>>

function satisfiesOperation<O extends Operation>(
  settings: Settings,
  _operation: O,
  keys: readonly SettingKey[],
): settings is SettingsFor<O> {
  return keys.every((key) => settings[key] !== undefined)
}

/**
 * Check the settings an operation depends on.
 *
 * @throws {ConfigurationError} "<setting> is not set" for the first missing field
 */
export function requireSettings<O extends Operation>(settings: Settings, operation: O): SettingsFor<O> {
  const keys: readonly SettingKey[] = OPERATION_REQUIREMENTS[operation]
  if (satisfiesOperation(settings, operation, keys)) {
    return settings
  }
  const missing = keys.find((key) => settings[key] === undefined)
  throw new ConfigurationError(`${missing ? SETTING_LABELS[missing] : "setting"} is not set`, {
    details: { operation, setting: missing },
  })
}

/**
 * Check individual settings outside the operation table, e.g. signer material
 */
export function requireSetting<K extends SettingKey>(settings: Settings, key: K): NonNullable<Settings[K]> {
  const value = settings[key]
  if (value === undefined || value === null) {
    throw new ConfigurationError(`${SETTING_LABELS[key]} is not set`, { details: { setting: key } })
  }
  return value
}
