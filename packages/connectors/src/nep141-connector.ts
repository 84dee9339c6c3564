/**
 * NEP-141 tokens bridged to ERC-20 mirrors minted by the token factory
 *
 * ```
 * logMetadata → storageDeposit → deployToken
 * deposit  → finalizeDeposit  (NEAR execution proof on EVM)
 *          → signTransfer → finalizeDepositSigned (locker signature on EVM)
 * withdraw → finalizeWithdraw (EVM receipt proof on NEAR)
 * ```
 */

import {
  errorMessage,
  type Hex,
  InvalidInputError,
  parseEvmAddress,
  pollUntil,
  requireSettings,
} from "@bridge-driver/core"
import { buildReceiptProof, readAllowance, readNearToEthToken } from "@bridge-driver/evm"
import { findSignTransferEvent, type SignTransferEvent } from "@bridge-driver/near"
import { ConnectorContext, type ConnectorDeps } from "./context.js"

export const SIGN_TRANSFER_POLL = { intervalMs: 2_000, timeoutMs: 500_000 } as const

function parseUnsigned(value: string, what: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new InvalidInputError(`Invalid ${what} in SignTransferEvent: ${value}`)
  }
  return BigInt(value)
}

export class Nep141Connector {
  private readonly ctx: ConnectorContext

  constructor(deps: ConnectorDeps) {
    this.ctx = new ConnectorContext(deps, "nep141-connector")
  }

  /**
   * Log the token metadata on the locker; its receipt feeds `deployToken`
   */
  async logMetadata(tokenId: string): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "nep141.logMetadata")
    const txHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildLogMetadata(settings.tokenLockerId, tokenId, this.ctx.nearSigner().accountId),
    )
    this.ctx.logger.info("sent log metadata", { tokenId, txHash })
    return txHash
  }

  /**
   * Register the locker on the token contract
   */
  async storageDeposit(tokenId: string, amount: bigint): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "nep141.storageDeposit")
    const txHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildStorageDeposit(
        tokenId,
        settings.tokenLockerId,
        amount,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent storage deposit", { tokenId, txHash, amount: amount.toString() })
    return txHash
  }

  /**
   * Deploy the ERC-20 mirror from the `log_metadata` receipt
   */
  async deployToken(receiptId: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "nep141.deployToken")
    const { proof, height } = await this.ctx.nearProofAtSyncHeight(receiptId, settings.tokenLockerId)
    const txHash = await this.ctx
      .evmSigner()
      .sendTransaction(this.ctx.evmBuilder().buildNewBridgeToken(settings.bridgeTokenFactoryAddress, proof, height))

    this.ctx.logger.info("sent token deploy", { receiptId, txHash, height: height.toString() })
    return txHash
  }

  /**
   * Lock tokens in the locker for an EVM recipient
   */
  async deposit(tokenId: string, amount: bigint, evmRecipient: string): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "nep141.deposit")
    const txHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildFtTransferCall(
        tokenId,
        settings.tokenLockerId,
        amount,
        evmRecipient,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent deposit", { tokenId, txHash, evmRecipient, amount: amount.toString() })
    return txHash
  }

  /**
   * Mint mirrored tokens from the proof of the locker's deposit receipt
   */
  async finalizeDeposit(receiptId: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "nep141.finalizeDeposit")
    const { proof, height } = await this.ctx.nearProofAtSyncHeight(receiptId, settings.tokenLockerId)
    const txHash = await this.ctx
      .evmSigner()
      .sendTransaction(this.ctx.evmBuilder().buildFactoryDeposit(settings.bridgeTokenFactoryAddress, proof, height))

    this.ctx.logger.info("sent finalize deposit", { receiptId, txHash, height: height.toString() })
    return txHash
  }

  /**
   * Burn mirrored tokens for a NEAR recipient. The factory pulls the tokens with
   * `transferFrom`, so a missing allowance is approved and mined first.
   */
  async withdraw(tokenId: string, amount: bigint, nearRecipient: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "nep141.withdraw")
    const factory = settings.bridgeTokenFactoryAddress
    const evm = this.ctx.evm()
    const signer = this.ctx.evmSigner()
    const builder = this.ctx.evmBuilder()

    const token = await readNearToEthToken(evm, factory, tokenId)
    this.ctx.logger.info("retrieved ERC-20 address", { tokenId, token })

    const allowance = await readAllowance(evm, token, signer.address, factory)
    if (allowance < amount) {
      const approveHash = await signer.sendTransaction(builder.buildApproval(token, factory, amount - allowance))
      await evm.waitForTransactionReceipt(approveHash)
      this.ctx.logger.info("approved tokens for spending", {
        approveHash,
        delta: (amount - allowance).toString(),
      })
    }

    const txHash = await signer.sendTransaction(builder.buildFactoryWithdraw(factory, tokenId, amount, nearRecipient))
    this.ctx.logger.info("sent withdraw", { tokenId, txHash, nearRecipient, amount: amount.toString() })
    return txHash
  }

  /**
   * Release locked tokens from the proof of the factory burn
   */
  async finalizeWithdraw(txHash: string, logIndex: number): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "nep141.finalizeWithdraw")
    const proof = await buildReceiptProof(this.ctx.evm(), txHash, logIndex)
    this.ctx.logger.debug("built receipt proof", { txHash, logIndex })

    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildLockerWithdraw(settings.tokenLockerId, proof, this.ctx.nearSigner().accountId),
    )
    this.ctx.logger.info("sent finalize withdraw", { txHash, nearTxHash })
    return nearTxHash
  }

  /**
   * Ask the locker to sign the transfer with `nonce`
   */
  async signTransfer(nonce: bigint, feeRecipient: string | null): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "nep141.signTransfer")
    const txHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildSignTransfer(
        settings.tokenLockerId,
        nonce,
        feeRecipient,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent sign transfer", { txHash, nonce: nonce.toString() })
    return txHash
  }

  /**
   * Wait for the locker's SignTransferEvent in the `sign_transfer` transaction and
   * claim the tokens on EVM with its signature
   *
   * @param sender - NEAR account that sent the `sign_transfer` transaction
   * @throws {FinalizationTimeoutError} if no event appears within 500 seconds
   */
  async finalizeDepositSigned(txHash: string, sender: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "nep141.finalizeDepositSigned")
    const near = this.ctx.near()

    const event = await pollUntil(
      async (): Promise<SignTransferEvent | undefined> => {
        const status = await near.txStatus(txHash, sender)
        return status === undefined ? undefined : findSignTransferEvent(status)
      },
      { ...SIGN_TRANSFER_POLL, description: `SignTransferEvent in ${txHash}` },
    )
    const payload = event.message_payload
    this.ctx.logger.debug("found SignTransferEvent", { txHash, nonce: payload.nonce })

    let recipient: Hex
    try {
      recipient = parseEvmAddress(
        payload.recipient.startsWith("0x") ? payload.recipient : `0x${payload.recipient}`,
        "recipient",
      )
    } catch (error) {
      throw new InvalidInputError(`SignTransferEvent: ${errorMessage(error)}`, { cause: error })
    }

    const tx = this.ctx.evmBuilder().buildSignedDeposit(
      settings.bridgeTokenFactoryAddress,
      {
        nonce: parseUnsigned(payload.nonce, "nonce"),
        token: payload.token,
        amount: parseUnsigned(payload.amount, "amount"),
        recipient,
        feeRecipient: payload.fee_recipient ?? "",
      },
      event.signature.toBytes(true),
    )
    const evmTxHash = await this.ctx.evmSigner().sendTransaction(tx)

    this.ctx.logger.info("sent signed deposit", { txHash, evmTxHash, nonce: payload.nonce })
    return evmTxHash
  }

  /**
   * Claim the relayer fee from the proof of the factory's signed deposit
   */
  async claimFee(txHash: string, logIndex: number): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "nep141.claimFee")
    const proof = await buildReceiptProof(this.ctx.evm(), txHash, logIndex)
    this.ctx.logger.debug("built receipt proof", { txHash, logIndex })

    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildClaimFee(settings.tokenLockerId, proof, this.ctx.nearSigner().accountId),
    )
    this.ctx.logger.info("sent claim fee", { txHash, nearTxHash })
    return nearTxHash
  }
}
