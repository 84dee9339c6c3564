/**
 * Conversion of NearUnsignedTransaction to near-kit transaction builders
 */

import type { NearUnsignedTransaction } from "@bridge-driver/core"
import type { Near } from "near-kit"
import { Amount, Gas } from "near-kit"

const TGAS = 1_000_000_000_000n

/**
 * Convert NearUnsignedTransaction to a near-kit TransactionBuilder.
 *
 * near-kit handles nonce, blockHash, and signing automatically.
 * The returned builder can be sent with `.send()` or built with `.build()`.
 *
 * @example
 * ```typescript
 * const near = new Near({ network: "testnet", privateKey: "ed25519:..." })
 * const unsigned = builder.buildLogMetadata("locker.testnet", "t.testnet", "alice.testnet")
 * const result = await toNearKitTransaction(near, unsigned).send()
 * ```
 */
export function toNearKitTransaction(near: Near, unsigned: NearUnsignedTransaction) {
  let tx = near.transaction(unsigned.signerId)

  for (const action of unsigned.actions) {
    tx = tx.functionCall(unsigned.receiverId, action.methodName, action.args, {
      gas: Gas.Tgas(Number(action.gas / TGAS)),
      attachedDeposit: Amount.yocto(action.deposit),
    })
  }

  return tx
}
