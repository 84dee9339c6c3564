/**
 * Read-only calls against the token factory and its ERC-20 mirrors
 */

import { errorMessage, type Hex, parseEvmAddress, RpcError } from "@bridge-driver/core"
import { decodeFunctionResult, encodeFunctionData } from "viem"
import { BRIDGE_TOKEN_FACTORY_ABI, ERC20_ABI } from "./abi.js"
import type { EvmRpc } from "./rpc.js"

function decoded<T>(what: string, fn: () => T): T {
  try {
    return fn()
  } catch (error) {
    throw new RpcError(`Malformed ${what} result: ${errorMessage(error)}`, "evm", { cause: error })
  }
}

/**
 * Address of the ERC-20 mirror the factory deployed for a NEAR token
 */
export async function readNearToEthToken(rpc: EvmRpc, factory: Hex, tokenId: string): Promise<Hex> {
  const data = await rpc.call({
    to: factory,
    data: encodeFunctionData({ abi: BRIDGE_TOKEN_FACTORY_ABI, functionName: "nearToEthToken", args: [tokenId] }),
  })
  const token = decoded("nearToEthToken", () =>
    decodeFunctionResult({ abi: BRIDGE_TOKEN_FACTORY_ABI, functionName: "nearToEthToken", data }),
  )
  return parseEvmAddress(token, `mirror token of ${tokenId}`)
}

export async function readAllowance(rpc: EvmRpc, token: Hex, owner: Hex, spender: Hex): Promise<bigint> {
  const data = await rpc.call({
    to: token,
    data: encodeFunctionData({ abi: ERC20_ABI, functionName: "allowance", args: [owner, spender] }),
  })
  return decoded("allowance", () => decodeFunctionResult({ abi: ERC20_ABI, functionName: "allowance", data }))
}
