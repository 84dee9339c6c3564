/**
 * Native coin bridged through the custodian contract and the NEAR eth connector
 *
 * ```
 * deposit:  depositToNear / depositToEvm  → finalizeDeposit  (EVM receipt proof on NEAR)
 * withdraw: withdraw                      → finalizeWithdraw (NEAR execution proof on EVM)
 * ```
 */

import { type Hex, parseEvmAddress, requireSettings } from "@bridge-driver/core"
import { buildReceiptProof } from "@bridge-driver/evm"
import { ConnectorContext, type ConnectorDeps } from "./context.js"

export class EthConnector {
  private readonly ctx: ConnectorContext

  constructor(deps: ConnectorDeps) {
    this.ctx = new ConnectorContext(deps, "eth-connector")
  }

  /**
   * Lock `amount` wei in the custodian for a NEAR account
   * @returns EVM transaction hash
   */
  async depositToNear(amount: bigint, nearRecipient: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "ethConnector.depositToNear")
    const tx = this.ctx.evmBuilder().buildDepositToNear(settings.ethCustodianAddress, nearRecipient, amount)
    const txHash = await this.ctx.evmSigner().sendTransaction(tx)

    this.ctx.logger.info("sent deposit to NEAR", { txHash, nearRecipient, amount: amount.toString() })
    return txHash
  }

  /**
   * Lock `amount` wei in the custodian for an EVM address held on NEAR
   */
  async depositToEvm(amount: bigint, evmRecipientOnNear: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "ethConnector.depositToEvm")
    const tx = this.ctx.evmBuilder().buildDepositToEvm(settings.ethCustodianAddress, evmRecipientOnNear, amount)
    const txHash = await this.ctx.evmSigner().sendTransaction(tx)

    this.ctx.logger.info("sent deposit to EVM on NEAR", {
      txHash,
      evmRecipientOnNear,
      amount: amount.toString(),
    })
    return txHash
  }

  /**
   * Prove the custodian deposit log on NEAR and mint the bridged coin
   * @returns NEAR transaction hash
   */
  async finalizeDeposit(txHash: string, logIndex: number): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "ethConnector.finalizeDeposit")

    const proof = await buildReceiptProof(this.ctx.evm(), txHash, logIndex)
    this.ctx.logger.debug("built receipt proof", { txHash, logIndex })

    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildConnectorDeposit(
        settings.ethConnectorAccountId,
        proof,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent finalize deposit", { txHash, nearTxHash })
    return nearTxHash
  }

  /**
   * Burn the bridged coin on NEAR for an EVM recipient
   */
  async withdraw(amount: bigint, evmRecipient: string): Promise<string> {
    const settings = requireSettings(this.ctx.settings, "ethConnector.withdraw")
    const recipient = parseEvmAddress(evmRecipient, "recipient address")

    const nearTxHash = await this.ctx.sendNear(
      this.ctx.nearBuilder.buildConnectorWithdraw(
        settings.ethConnectorAccountId,
        recipient,
        amount,
        this.ctx.nearSigner().accountId,
      ),
    )
    this.ctx.logger.info("sent withdraw", { nearTxHash, recipient, amount: amount.toString() })
    return nearTxHash
  }

  /**
   * Prove the burn receipt against the light client and release the coin on EVM
   *
   * @throws {LightClientLagError} if the light client has not reached the burn's block
   */
  async finalizeWithdraw(receiptId: string): Promise<Hex> {
    const settings = requireSettings(this.ctx.settings, "ethConnector.finalizeWithdraw")

    const { proof, height } = await this.ctx.nearProofAtSyncHeight(receiptId, settings.ethConnectorAccountId)
    const tx = this.ctx.evmBuilder().buildCustodianWithdraw(settings.ethCustodianAddress, proof, height)
    const txHash = await this.ctx.evmSigner().sendTransaction(tx)

    this.ctx.logger.info("sent finalize withdraw", { receiptId, txHash, height: height.toString() })
    return txHash
  }
}
