/**
 * EVM signing capability
 */

import {
  DEFAULT_RPC_TIMEOUT_MS,
  type EvmUnsignedTransaction,
  errorMessage,
  type Hex,
  InvalidInputError,
  RpcError,
} from "@bridge-driver/core"
import { createWalletClient, defineChain, http } from "viem"
import { privateKeyToAccount } from "viem/accounts"

/**
 * Signs an unsigned transaction and broadcasts it. Nonce and fee selection
 * belong to the implementation.
 */
export interface EvmSigner {
  readonly address: Hex
  readonly chainId: number
  sendTransaction(tx: EvmUnsignedTransaction): Promise<Hex>
}

export interface ViemEvmSignerConfig {
  rpcUrl: string
  chainId: number
  privateKey: Hex
}

/**
 * EvmSigner backed by a viem wallet client with a local account
 *
 * @example
 * ```typescript
 * const signer = createViemEvmSigner({ rpcUrl, chainId: 11155111, privateKey })
 * const hash = await signer.sendTransaction(builder.buildDepositToNear(custodian, "alice.testnet", 1n))
 * ```
 */
export function createViemEvmSigner(config: ViemEvmSignerConfig): EvmSigner {
  const account = privateKeyToAccount(config.privateKey)
  const chain = defineChain({
    id: config.chainId,
    name: `evm-${config.chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [config.rpcUrl] } },
  })
  const client = createWalletClient({
    account,
    chain,
    transport: http(config.rpcUrl, { timeout: DEFAULT_RPC_TIMEOUT_MS, retryCount: 0 }),
  })

  return {
    address: account.address,
    chainId: config.chainId,
    async sendTransaction(tx: EvmUnsignedTransaction): Promise<Hex> {
      if (tx.chainId !== config.chainId) {
        throw new InvalidInputError(
          `Transaction targets chain ${tx.chainId}, signer is configured for ${config.chainId}`,
        )
      }
      try {
        return await client.sendTransaction({ to: tx.to, data: tx.data, value: tx.value })
      } catch (error) {
        throw new RpcError(`Failed to submit transaction to ${tx.to}: ${errorMessage(error)}`, "evm", {
          cause: error,
        })
      }
    },
  }
}
