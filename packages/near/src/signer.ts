/**
 * NEAR signing capability
 */

import { errorMessage, InvalidInputError, type NearUnsignedTransaction, RpcError } from "@bridge-driver/core"
import type { Near } from "near-kit"
import { toNearKitTransaction } from "./shims.js"

/**
 * Signs an unsigned transaction and broadcasts it. The implementation resolves
 * the access key nonce and the recent block hash.
 */
export interface NearSigner {
  readonly accountId: string
  sendTransaction(tx: NearUnsignedTransaction): Promise<string>
}

/**
 * NearSigner backed by a configured near-kit instance
 *
 * @example
 * ```typescript
 * const near = new Near({ network: "testnet", privateKey: "ed25519:..." })
 * const signer = createNearKitSigner(near, "alice.testnet")
 * ```
 */
export function createNearKitSigner(near: Near, accountId: string): NearSigner {
  return {
    accountId,
    async sendTransaction(tx: NearUnsignedTransaction): Promise<string> {
      if (tx.signerId !== accountId) {
        throw new InvalidInputError(`Transaction is signed by ${tx.signerId}, signer holds ${accountId}`)
      }
      try {
        const outcome = await toNearKitTransaction(near, tx).send()
        return outcome.transaction.hash
      } catch (error) {
        throw new RpcError(
          `Failed to submit ${tx.actions.map((a) => a.methodName).join(", ")} to ${tx.receiverId}: ${errorMessage(error)}`,
          "near",
          { cause: error },
        )
      }
    },
  }
}
