/**
 * EVM transaction builder for the bridge contracts
 */

import { bytesToHex, type EvmUnsignedTransaction, type Hex } from "@bridge-driver/core"
import { encodeFunctionData } from "viem"
import {
  BRIDGE_TOKEN_FACTORY_ABI,
  BRIDGE_TOKEN_FACTORY_SIGNED_ABI,
  ERC20_ABI,
  ETH_CUSTODIAN_ABI,
  FAST_BRIDGE_ABI,
} from "./abi.js"

export interface EvmBuilderConfig {
  chainId: number
}

/**
 * Payload signed by the token locker for the sign-then-claim deposit
 */
export interface BridgeDeposit {
  nonce: bigint
  token: string
  amount: bigint
  recipient: Hex
  feeRecipient: string
}

export interface FastBridgeTransferTokens {
  token: Hex
  recipient: Hex
  nonce: bigint
  amount: bigint
  unlockRecipient: string
  validTillBlockHeight: bigint
}

/**
 * EVM transaction builder interface
 */
export interface EvmBuilder {
  readonly chainId: number

  /**
   * Lock native coin in the custodian for a NEAR account
   */
  buildDepositToNear(custodian: Hex, nearRecipient: string, amount: bigint): EvmUnsignedTransaction

  /**
   * Lock native coin in the custodian for an EVM address on NEAR
   */
  buildDepositToEvm(custodian: Hex, evmRecipientOnNear: string, amount: bigint): EvmUnsignedTransaction

  /**
   * Release native coin from the custodian against a NEAR burn proof
   */
  buildCustodianWithdraw(custodian: Hex, proof: Uint8Array, proofBlockHeight: bigint): EvmUnsignedTransaction

  /**
   * Deploy the ERC-20 mirror of a NEP-141 token from a log_metadata proof
   */
  buildNewBridgeToken(factory: Hex, proof: Uint8Array, proofBlockHeight: bigint): EvmUnsignedTransaction

  /**
   * Mint mirrored tokens from a NEAR lock proof
   */
  buildFactoryDeposit(factory: Hex, proof: Uint8Array, proofBlockHeight: bigint): EvmUnsignedTransaction

  /**
   * Mint mirrored tokens from a locker-signed payload
   */
  buildSignedDeposit(factory: Hex, payload: BridgeDeposit, signature: Uint8Array): EvmUnsignedTransaction

  /**
   * Burn mirrored tokens for a NEAR recipient
   */
  buildFactoryWithdraw(factory: Hex, token: string, amount: bigint, recipient: string): EvmUnsignedTransaction

  /**
   * Build an ERC20 approval transaction
   */
  buildApproval(token: Hex, spender: Hex, amount: bigint): EvmUnsignedTransaction

  /**
   * Pay out a pending fast bridge transfer; `value` carries the amount
   */
  buildTransferTokens(fastBridge: Hex, transfer: FastBridgeTransferTokens): EvmUnsignedTransaction
}

class EvmBuilderImpl implements EvmBuilder {
  readonly chainId: number

  constructor(config: EvmBuilderConfig) {
    this.chainId = config.chainId
  }

  buildDepositToNear(custodian: Hex, nearRecipient: string, amount: bigint): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: ETH_CUSTODIAN_ABI,
      functionName: "depositToNear",
      args: [nearRecipient, 0n],
    })
    return this.tx(custodian, data, amount)
  }

  buildDepositToEvm(custodian: Hex, evmRecipientOnNear: string, amount: bigint): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: ETH_CUSTODIAN_ABI,
      functionName: "depositToEVM",
      args: [evmRecipientOnNear, 0n],
    })
    return this.tx(custodian, data, amount)
  }

  buildCustodianWithdraw(
    custodian: Hex,
    proof: Uint8Array,
    proofBlockHeight: bigint,
  ): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: ETH_CUSTODIAN_ABI,
      functionName: "withdraw",
      args: [bytesToHex(proof), proofBlockHeight],
    })
    return this.tx(custodian, data)
  }

  buildNewBridgeToken(factory: Hex, proof: Uint8Array, proofBlockHeight: bigint): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: BRIDGE_TOKEN_FACTORY_ABI,
      functionName: "newBridgeToken",
      args: [bytesToHex(proof), proofBlockHeight],
    })
    return this.tx(factory, data)
  }

  buildFactoryDeposit(factory: Hex, proof: Uint8Array, proofBlockHeight: bigint): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: BRIDGE_TOKEN_FACTORY_ABI,
      functionName: "deposit",
      args: [bytesToHex(proof), proofBlockHeight],
    })
    return this.tx(factory, data)
  }

  buildSignedDeposit(factory: Hex, payload: BridgeDeposit, signature: Uint8Array): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: BRIDGE_TOKEN_FACTORY_SIGNED_ABI,
      functionName: "deposit",
      args: [
        bytesToHex(signature),
        {
          nonce: payload.nonce,
          token: payload.token,
          amount: payload.amount,
          recipient: payload.recipient,
          feeRecipient: payload.feeRecipient,
        },
      ],
    })
    return this.tx(factory, data)
  }

  buildFactoryWithdraw(
    factory: Hex,
    token: string,
    amount: bigint,
    recipient: string,
  ): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: BRIDGE_TOKEN_FACTORY_ABI,
      functionName: "withdraw",
      args: [token, amount, recipient],
    })
    return this.tx(factory, data)
  }

  buildApproval(token: Hex, spender: Hex, amount: bigint): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: ERC20_ABI,
      functionName: "approve",
      args: [spender, amount],
    })
    return this.tx(token, data)
  }

  buildTransferTokens(fastBridge: Hex, transfer: FastBridgeTransferTokens): EvmUnsignedTransaction {
    const data = encodeFunctionData({
      abi: FAST_BRIDGE_ABI,
      functionName: "transferTokens",
      args: [
        transfer.token,
        transfer.recipient,
        transfer.nonce,
        transfer.amount,
        transfer.unlockRecipient,
        transfer.validTillBlockHeight,
      ],
    })
    return this.tx(fastBridge, data, transfer.amount)
  }

  private tx(to: Hex, data: Hex, value = 0n): EvmUnsignedTransaction {
    return { chainId: this.chainId, to, data, value }
  }
}

/**
 * Create an EVM transaction builder
 *
 * @example
 * ```typescript
 * const builder = createEvmBuilder({ chainId: 11155111 })
 * const tx = builder.buildDepositToNear(custodian, "alice.testnet", parseEther("1"))
 * await walletClient.sendTransaction(tx)
 * ```
 */
export function createEvmBuilder(config: EvmBuilderConfig): EvmBuilder {
  return new EvmBuilderImpl(config)
}
