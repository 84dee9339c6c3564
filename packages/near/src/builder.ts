/**
 * NEAR transaction builder for the bridge contracts
 */

import {
  encodeJsonArgs,
  type Hex,
  hexToFixedBytes,
  type NearAction,
  type NearUnsignedTransaction,
  type ReceiptProof,
} from "@bridge-driver/core"
import { encodeUnlockProof, ethProofJson, serializeEthProof } from "./eth-proof.js"
import { DEPOSIT, GAS, type UnlockProof, WithdrawArgsSchema } from "./types.js"

export interface FastBridgeWithdrawParams {
  tokenId: string
  amount?: bigint
  recipientId?: string
  msg?: string
}

/**
 * NEAR transaction builder interface
 */
export interface NearBuilder {
  /**
   * Emit the token metadata event the factory deploys mirrors from
   */
  buildLogMetadata(locker: string, tokenId: string, signerId: string): NearUnsignedTransaction

  /**
   * Register `accountId` for storage on the token contract
   */
  buildStorageDeposit(
    tokenId: string,
    accountId: string,
    amount: bigint,
    signerId: string,
  ): NearUnsignedTransaction

  /**
   * NEP-141 transfer with a message to the receiving contract
   */
  buildFtTransferCall(
    tokenId: string,
    receiverId: string,
    amount: bigint,
    msg: string,
    signerId: string,
  ): NearUnsignedTransaction

  /**
   * Mint the bridged coin on NEAR from a custodian deposit proof
   */
  buildConnectorDeposit(connector: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction

  /**
   * Burn the bridged coin on NEAR for an EVM recipient
   */
  buildConnectorWithdraw(
    connector: string,
    recipient: Hex,
    amount: bigint,
    signerId: string,
  ): NearUnsignedTransaction

  /**
   * Release locked tokens from a factory burn proof
   */
  buildLockerWithdraw(locker: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction

  /**
   * Ask the locker to sign a pending transfer
   */
  buildSignTransfer(
    locker: string,
    nonce: bigint,
    feeRecipient: string | null,
    signerId: string,
  ): NearUnsignedTransaction

  /**
   * Claim the relayer fee of a signed transfer from its EVM deposit proof
   */
  buildClaimFee(locker: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction

  /**
   * Reimburse the liquidity provider from a TransferTokens proof
   */
  buildLpUnlock(fastBridge: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction

  /**
   * Refund an unclaimed transfer from a storage proof
   */
  buildUnlock(
    fastBridge: string,
    nonce: bigint,
    proof: UnlockProof,
    signerId: string,
  ): NearUnsignedTransaction

  /**
   * Withdraw a fast bridge balance
   */
  buildFastBridgeWithdraw(
    fastBridge: string,
    params: FastBridgeWithdrawParams,
    signerId: string,
  ): NearUnsignedTransaction
}

function call(
  signerId: string,
  receiverId: string,
  methodName: string,
  args: Uint8Array,
  gas: bigint,
  deposit: bigint,
): NearUnsignedTransaction {
  const action: NearAction = { type: "FunctionCall", methodName, args, gas, deposit }
  return { type: "near", signerId, receiverId, actions: [action] }
}

class NearBuilderImpl implements NearBuilder {
  buildLogMetadata(locker: string, tokenId: string, signerId: string): NearUnsignedTransaction {
    return call(
      signerId,
      locker,
      "log_metadata",
      encodeJsonArgs({ token_id: tokenId }),
      GAS.DEFAULT,
      DEPOSIT.LOG_METADATA,
    )
  }

  buildStorageDeposit(
    tokenId: string,
    accountId: string,
    amount: bigint,
    signerId: string,
  ): NearUnsignedTransaction {
    return call(
      signerId,
      tokenId,
      "storage_deposit",
      encodeJsonArgs({ account_id: accountId }),
      GAS.DEFAULT,
      amount,
    )
  }

  buildFtTransferCall(
    tokenId: string,
    receiverId: string,
    amount: bigint,
    msg: string,
    signerId: string,
  ): NearUnsignedTransaction {
    const args = {
      receiver_id: receiverId,
      amount: amount.toString(),
      msg,
    }
    return call(signerId, tokenId, "ft_transfer_call", encodeJsonArgs(args), GAS.FT_TRANSFER_CALL, DEPOSIT.ONE_YOCTO)
  }

  buildConnectorDeposit(connector: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction {
    return call(signerId, connector, "deposit", serializeEthProof(proof), GAS.DEFAULT, DEPOSIT.NONE)
  }

  buildConnectorWithdraw(
    connector: string,
    recipient: Hex,
    amount: bigint,
    signerId: string,
  ): NearUnsignedTransaction {
    const args = WithdrawArgsSchema.serialize({
      recipient_address: Array.from(hexToFixedBytes(recipient, 20, "recipient address")),
      amount,
    })
    return call(signerId, connector, "withdraw", args, GAS.DEFAULT, DEPOSIT.ONE_YOCTO)
  }

  buildLockerWithdraw(locker: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction {
    return call(signerId, locker, "withdraw", serializeEthProof(proof), GAS.DEFAULT, DEPOSIT.LOCKER_WITHDRAW)
  }

  buildSignTransfer(
    locker: string,
    nonce: bigint,
    feeRecipient: string | null,
    signerId: string,
  ): NearUnsignedTransaction {
    const args = { nonce: nonce.toString(), fee_recipient: feeRecipient }
    return call(signerId, locker, "sign_transfer", encodeJsonArgs(args), GAS.DEFAULT, DEPOSIT.SIGN_TRANSFER)
  }

  buildClaimFee(locker: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction {
    return call(signerId, locker, "claim_fee", serializeEthProof(proof), GAS.DEFAULT, DEPOSIT.NONE)
  }

  buildLpUnlock(fastBridge: string, proof: ReceiptProof, signerId: string): NearUnsignedTransaction {
    const args = { proof: ethProofJson(proof) }
    return call(signerId, fastBridge, "lp_unlock", encodeJsonArgs(args), GAS.LP_UNLOCK, DEPOSIT.NONE)
  }

  buildUnlock(
    fastBridge: string,
    nonce: bigint,
    proof: UnlockProof,
    signerId: string,
  ): NearUnsignedTransaction {
    const args = { nonce: nonce.toString(), proof: encodeUnlockProof(proof) }
    return call(signerId, fastBridge, "unlock", encodeJsonArgs(args), GAS.DEFAULT, DEPOSIT.NONE)
  }

  buildFastBridgeWithdraw(
    fastBridge: string,
    params: FastBridgeWithdrawParams,
    signerId: string,
  ): NearUnsignedTransaction {
    // Absent fields are left out so the contract applies its defaults
    const args: Record<string, string> = { token_id: params.tokenId }
    if (params.recipientId !== undefined) {
      args["recipient_id"] = params.recipientId
    }
    if (params.amount !== undefined) {
      args["amount"] = params.amount.toString()
    }
    if (params.msg !== undefined) {
      args["msg"] = params.msg
    }
    return call(
      signerId,
      fastBridge,
      "withdraw",
      encodeJsonArgs(args),
      GAS.FAST_BRIDGE_WITHDRAW,
      DEPOSIT.NONE,
    )
  }
}

/**
 * Create a NEAR transaction builder
 *
 * @example
 * ```typescript
 * const builder = createNearBuilder()
 * const unsigned = builder.buildLogMetadata("locker.testnet", "t.testnet", "alice.testnet")
 * await toNearKitTransaction(near, unsigned).send()
 * ```
 */
export function createNearBuilder(): NearBuilder {
  return new NearBuilderImpl()
}
