/**
 * Dependency wiring shared by the connectors
 *
 * Every capability can be injected. Missing ones are built from settings on
 * first use and kept for the lifetime of the connector.
 */

import {
  createLogger,
  decodeCryptoHash,
  hexToBytes,
  InvalidInputError,
  LightClientLagError,
  type Logger,
  type NearUnsignedTransaction,
  requireSetting,
  type Settings,
} from "@bridge-driver/core"
import {
  createEvmBuilder,
  createEvmRpc,
  createNearLightClient,
  createViemEvmSigner,
  type EvmBuilder,
  type EvmRpc,
  type EvmSigner,
  type NearLightClient,
} from "@bridge-driver/evm"
import {
  createNearBuilder,
  createNearKitSigner,
  createNearRpc,
  type NearBuilder,
  type NearRpc,
  type NearSigner,
  proofBlockHeight,
  serializeNearProof,
} from "@bridge-driver/near"
import { Near } from "near-kit"

export interface ConnectorDeps {
  settings: Settings
  evm?: EvmRpc
  near?: NearRpc
  lightClient?: NearLightClient
  evmSigner?: EvmSigner
  nearSigner?: NearSigner
  logger?: Logger
}

/**
 * NEAR execution proof ready for an EVM contract, paired with the light client
 * height it was rooted at
 */
export interface GatedNearProof {
  proof: Uint8Array
  height: bigint
}

export class ConnectorContext {
  readonly settings: Settings
  readonly logger: Logger
  readonly nearBuilder: NearBuilder = createNearBuilder()

  private evmRpc?: EvmRpc
  private nearRpc?: NearRpc
  private nearLightClient?: NearLightClient
  private evmSignerInstance?: EvmSigner
  private nearSignerInstance?: NearSigner

  constructor(deps: ConnectorDeps, service: string) {
    this.settings = deps.settings
    this.logger = deps.logger ?? createLogger(service)
    this.evmRpc = deps.evm
    this.nearRpc = deps.near
    this.nearLightClient = deps.lightClient
    this.evmSignerInstance = deps.evmSigner
    this.nearSignerInstance = deps.nearSigner
  }

  evm(): EvmRpc {
    this.evmRpc ??= createEvmRpc({ url: requireSetting(this.settings, "evmRpcUrl") })
    return this.evmRpc
  }

  near(): NearRpc {
    this.nearRpc ??= createNearRpc({ url: requireSetting(this.settings, "nearRpcUrl") })
    return this.nearRpc
  }

  lightClient(): NearLightClient {
    this.nearLightClient ??= createNearLightClient(
      this.evm(),
      requireSetting(this.settings, "nearLightClientAddress"),
    )
    return this.nearLightClient
  }

  evmSigner(): EvmSigner {
    this.evmSignerInstance ??= createViemEvmSigner({
      rpcUrl: requireSetting(this.settings, "evmRpcUrl"),
      chainId: requireSetting(this.settings, "evmChainId"),
      privateKey: requireSetting(this.settings, "evmPrivateKey"),
    })
    return this.evmSignerInstance
  }

  nearSigner(): NearSigner {
    if (!this.nearSignerInstance) {
      const accountId = requireSetting(this.settings, "nearSignerId")
      // Signing, nonce lookup and broadcast share the gateway's endpoint
      const near = new Near({
        network: requireSetting(this.settings, "nearNetwork"),
        rpcUrl: requireSetting(this.settings, "nearRpcUrl"),
        privateKey: requireSetting(this.settings, "nearPrivateKey"),
        defaultSignerId: accountId,
      })
      this.nearSignerInstance = createNearKitSigner(near, accountId)
    }
    return this.nearSignerInstance
  }

  evmBuilder(): EvmBuilder {
    return createEvmBuilder({ chainId: this.evmSigner().chainId })
  }

  /**
   * Submit a single function call through the NEAR gateway
   */
  sendNear(tx: NearUnsignedTransaction): Promise<string> {
    const [action, ...rest] = tx.actions
    if (action === undefined || rest.length > 0) {
      throw new InvalidInputError(`Expected one function call to ${tx.receiverId}, got ${tx.actions.length}`)
    }
    return this.near().change(
      this.nearSigner(),
      tx.receiverId,
      action.methodName,
      action.args,
      action.gas,
      action.deposit,
    )
  }

  /**
   * Fetch the execution proof of `receiptId` rooted at the light client's
   * current head. The returned height is the one the EVM contract checks the
   * proof against.
   *
   * @throws {LightClientLagError} if the receipt's block is above the synced head
   */
  async nearProofAtSyncHeight(receiptId: string, receiverId: string): Promise<GatedNearProof> {
    decodeCryptoHash(receiptId, "receipt id")

    const lightClient = this.lightClient()
    const height = await lightClient.syncHeight()
    const head = await lightClient.blockHash(height)
    this.logger.debug("light client head", { height: height.toString(), head })

    const proof = await this.near().getLightClientProof({ receiptId, receiverId }, hexToBytes(head))
    const proofHeight = proofBlockHeight(proof)
    if (proofHeight > height) {
      throw new LightClientLagError(proofHeight, height, { details: { receiptId } })
    }
    this.logger.debug("retrieved NEAR proof", { receiptId, proofHeight: proofHeight.toString() })

    return { proof: serializeNearProof(proof), height }
  }
}
