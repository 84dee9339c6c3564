/**
 * Queries against the NEAR light client deployed on the EVM chain
 */

import { type Hex, parseEvmAddress, ProofBuildError, RpcError, errorMessage } from "@bridge-driver/core"
import { decodeFunctionResult, encodeFunctionData } from "viem"
import { NEAR_LIGHT_CLIENT_ABI } from "./abi.js"
import type { EvmRpc } from "./rpc.js"

const ZERO_HASH = `0x${"0".repeat(64)}`

export interface NearLightClient {
  /** Height of the latest NEAR block the light client accepted */
  syncHeight(): Promise<bigint>
  /** Hash of the NEAR block at `height` as stored by the light client */
  blockHash(height: bigint): Promise<Hex>
}

class NearLightClientImpl implements NearLightClient {
  private readonly address: Hex

  constructor(
    private readonly rpc: EvmRpc,
    address: string,
  ) {
    this.address = parseEvmAddress(address, "light client address")
  }

  async syncHeight(): Promise<bigint> {
    const result = await this.rpc.call({
      to: this.address,
      data: encodeFunctionData({ abi: NEAR_LIGHT_CLIENT_ABI, functionName: "bridgeState" }),
    })
    const [currentHeight] = this.decode(() =>
      decodeFunctionResult({ abi: NEAR_LIGHT_CLIENT_ABI, functionName: "bridgeState", data: result }),
    )
    return currentHeight
  }

  async blockHash(height: bigint): Promise<Hex> {
    const result = await this.rpc.call({
      to: this.address,
      data: encodeFunctionData({
        abi: NEAR_LIGHT_CLIENT_ABI,
        functionName: "blockHashes",
        args: [height],
      }),
    })
    const hash = this.decode(() =>
      decodeFunctionResult({ abi: NEAR_LIGHT_CLIENT_ABI, functionName: "blockHashes", data: result }),
    )
    if (hash === ZERO_HASH) {
      throw new ProofBuildError(`Light client has no block hash for height ${height}`)
    }
    return hash
  }

  private decode<T>(fn: () => T): T {
    try {
      return fn()
    } catch (error) {
      throw new RpcError(`Malformed light client response: ${errorMessage(error)}`, "evm", { cause: error })
    }
  }
}

export function createNearLightClient(rpc: EvmRpc, address: string): NearLightClient {
  return new NearLightClientImpl(rpc, address)
}
