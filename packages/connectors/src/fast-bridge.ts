/**
 * Fast bridge: a liquidity provider pays out on EVM and is reimbursed on NEAR
 *
 * ```
 * transfer → completeTransferOnEvm → lpUnlock (TransferTokens receipt proof)
 *          → unlock                            (storage proof: transfer never paid)
 * ```
 */

import {
  bytesToHex,
  type Hex,
  hexToFixedBytes,
  InvalidInputError,
  parseEvmAddress,
  ProofBuildError,
  requireSettings,
  toBase64,
} from "@bridge-driver/core"
import {
  buildReceiptProof,
  buildStorageProof,
  encodeAccountData,
  encodeBlockHeader,
  fastBridgeTransferSlotKey,
  findLogByTopic,
  TRANSFER_TOKENS_TOPIC,
} from "@bridge-driver/evm"
import {
  type FastBridgeWithdrawParams,
  type PendingTransfer,
  parsePendingTransfer,
  type TransferMessage,
  TransferMessageSchema,
  toUnlockProof,
} from "@bridge-driver/near"
import { ConnectorContext, type ConnectorDeps } from "./context.js"

const VALID_TILL_WINDOW_NS = 30n * 60n * 1_000_000_000n

/**
 * Default transfer deadline: 30 minutes after `nowMs`, in nanoseconds
 */
export function defaultValidTill(nowMs: number = Date.now()): bigint {
  return BigInt(nowMs) * 1_000_000n + VALID_TILL_WINDOW_NS
}

export interface FastBridgeTransferParams {
  tokenId: string
  amount: bigint
  fee: bigint
  evmTokenAddress: string
  evmRecipient: string
  /** Deadline in nanoseconds since the epoch */
  validTill: bigint
  validTillBlockHeight?: bigint
}

function validTillBlockHeight(pending: PendingTransfer, nonce: bigint): bigint {
  const height = pending.message.valid_till_block_height
  if (height === null) {
    throw new InvalidInputError(`Pending transfer ${nonce} has no valid_till_block_height`)
  }
  return height
}

export class FastBridge {
  private readonly ctx: ConnectorContext

  constructor(deps: ConnectorDeps) {
    this.ctx = new ConnectorContext(deps, "fast-bridge")
  }

  /**
   * Send tokens to the fast bridge with the transfer message as `ft_transfer_call` msg
   */
  async transfer(params: FastBridgeTransferParams): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "fastBridge.transfer")

    const message: TransferMessage = {
      valid_till: params.validTill,
      transfer: {
        token_near: params.tokenId,
        token_eth: Array.from(hexToFixedBytes(params.evmTokenAddress, 20, "EVM token address")),
        amount: params.amount,
      },
      fee: { token: params.tokenId, amount: params.fee },
      recipient: Array.from(hexToFixedBytes(params.evmRecipient, 20, "recipient address")),
      valid_till_block_height: params.validTillBlockHeight ?? null,
      aurora_sender: null,
    }
    const msg = toBase64(TransferMessageSchema.serialize(message))

    const txHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildFtTransferCall(
        params.tokenId,
        settings.fastBridgeAccountId,
        params.amount,
        msg,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent tokens to the fast bridge", {
      txHash,
      tokenId: params.tokenId,
      amount: params.amount.toString(),
      fee: params.fee.toString(),
    })
    return txHash
  }

  async getPendingTransfer(nonce: bigint): Promise<PendingTransfer> {
    const settings = requireSettings(this.ctx.settings, "fastBridge.getPendingTransfer")
    const result = await this.ctx
      .near()
      .view(settings.fastBridgeAccountId, "get_pending_transfer", { id: nonce.toString() })
    return parsePendingTransfer(result)
  }

  /**
   * Pay the pending transfer out on EVM; the receipt is the LP's claim for `lpUnlock`
   */
  async completeTransferOnEvm(nonce: bigint, unlockRecipient: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "fastBridge.completeTransferOnEvm")
    const pending = await this.getPendingTransfer(nonce)
    const { message } = pending

    const tx = this.ctx.evmBuilder().buildTransferTokens(settings.fastBridgeAddress, {
      token: bytesToHex(Uint8Array.from(message.transfer.token_eth)),
      recipient: bytesToHex(Uint8Array.from(message.recipient)),
      nonce,
      amount: message.transfer.amount,
      unlockRecipient,
      validTillBlockHeight: validTillBlockHeight(pending, nonce),
    })
    const txHash = await this.ctx.evmSigner().sendTransaction(tx)

    this.ctx.logger.info("completed fast bridge transfer", { nonce: nonce.toString(), txHash })
    return txHash
  }

  /**
   * Reimburse the LP on NEAR from the TransferTokens log of `txHash`
   */
  async lpUnlock(txHash: string): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "fastBridge.lpUnlock")
    const evm = this.ctx.evm()

    const receipt = await evm.getTransactionReceipt(txHash)
    const logIndex = findLogByTopic(receipt.logs, TRANSFER_TOKENS_TOPIC)
    if (logIndex < 0) {
      throw new ProofBuildError(`TransferTokens log not found in ${txHash}`)
    }

    const proof = await buildReceiptProof(evm, txHash, logIndex)
    this.ctx.logger.debug("built receipt proof", { txHash, logIndex })

    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildLpUnlock(settings.fastBridgeAccountId, proof, this.ctx.nearSigner().accountId),
    )
    this.ctx.logger.info("sent lp unlock", { txHash, nearTxHash })
    return nearTxHash
  }

  /**
   * Refund a transfer nobody paid out, proving its slot is empty at the deadline height
   */
  async unlock(nonce: bigint): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "fastBridge.unlock")
    const pending = await this.getPendingTransfer(nonce)
    const height = validTillBlockHeight(pending, nonce)
    const { message } = pending

    const slotKey = fastBridgeTransferSlotKey({
      token: parseEvmAddress(bytesToHex(Uint8Array.from(message.transfer.token_eth))),
      recipient: parseEvmAddress(bytesToHex(Uint8Array.from(message.recipient))),
      nonce,
      amount: message.transfer.amount,
    })

    const evm = this.ctx.evm()
    const [storage, header] = await Promise.all([
      buildStorageProof(evm, settings.fastBridgeAddress, slotKey, height),
      evm.getBlockByNumber(height),
    ])
    this.ctx.logger.debug("built storage proof", { nonce: nonce.toString(), slotKey, height: height.toString() })

    const proof = toUnlockProof(storage, encodeBlockHeader(header), encodeAccountData(storage))
    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildUnlock(settings.fastBridgeAccountId, nonce, proof, this.ctx.nearSigner().accountId),
    )
    this.ctx.logger.info("sent unlock", { nonce: nonce.toString(), nearTxHash })
    return nearTxHash
  }

  async withdraw(params: FastBridgeWithdrawParams): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "fastBridge.withdraw")
    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildFastBridgeWithdraw(
        settings.fastBridgeAccountId,
        params,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent withdraw", { tokenId: params.tokenId, nearTxHash })
    return nearTxHash
  }
}
