/**
 * EVM JSON-RPC gateway
 */

import {
  InvalidInputError,
  JsonRpcClient,
  type JsonRpcClientConfig,
  parseEvmAddress,
  parseHash,
  pollUntil,
  RpcError,
  type StorageProof,
  type Hex,
} from "@bridge-driver/core"
import { numberToHex, pad } from "viem"
import { z } from "zod"
import {
  DataSchema,
  type EvmBlockHeader,
  EvmBlockHeaderSchema,
  type EvmReceipt,
  EvmReceiptSchema,
  type EvmTransactionStatus,
  StorageProofSchema,
} from "./types.js"

export interface WaitForReceiptOptions {
  intervalMs?: number
  timeoutMs?: number
}

/**
 * Read surface of an EVM node used by the proof builders and connectors
 */
export interface EvmRpc {
  getBlockByNumber(height: bigint): Promise<EvmBlockHeader>
  getTransactionReceipt(txHash: string): Promise<EvmReceipt>
  getBlockReceipts(height: bigint): Promise<EvmReceipt[]>
  getProof(address: string, slotKey: Hex, blockHeight: bigint): Promise<StorageProof>
  /** `eth_call` against the latest block */
  call(request: { to: Hex; data: Hex }): Promise<Hex>
  /** Wait until the transaction is mined; a reverted transaction fails */
  waitForTransactionReceipt(txHash: Hex, options?: WaitForReceiptOptions): Promise<EvmTransactionStatus>
}

const DEFAULT_RECEIPT_WAIT = { intervalMs: 2_000, timeoutMs: 300_000 }

class EvmRpcGateway implements EvmRpc {
  private readonly client: JsonRpcClient

  constructor(config: JsonRpcClientConfig) {
    this.client = new JsonRpcClient(config, "evm")
  }

  async getBlockByNumber(height: bigint): Promise<EvmBlockHeader> {
    const header = await this.client.call(
      "eth_getBlockByNumber",
      [numberToHex(height), false],
      EvmBlockHeaderSchema.nullable(),
    )
    if (header === null) {
      throw new RpcError(`Block ${height} not found`, "evm", { details: { height: height.toString() } })
    }
    return header
  }

  async getTransactionReceipt(txHash: string): Promise<EvmReceipt> {
    const hash = parseHash(txHash, "transaction hash")
    const receipt = await this.client.call(
      "eth_getTransactionReceipt",
      [hash],
      EvmReceiptSchema.nullable(),
    )
    if (receipt === null) {
      throw new InvalidInputError(`Transaction receipt not found for ${hash}`)
    }
    return receipt
  }

  async getBlockReceipts(height: bigint): Promise<EvmReceipt[]> {
    return this.client.call("eth_getBlockReceipts", [numberToHex(height)], z.array(EvmReceiptSchema))
  }

  async getProof(address: string, slotKey: Hex, blockHeight: bigint): Promise<StorageProof> {
    const account = parseEvmAddress(address, "contract address")
    return this.client.call(
      "eth_getProof",
      [account, [pad(slotKey, { size: 32 })], numberToHex(blockHeight)],
      StorageProofSchema,
    )
  }

  async call(request: { to: Hex; data: Hex }): Promise<Hex> {
    return this.client.call("eth_call", [request, "latest"], DataSchema)
  }

  async waitForTransactionReceipt(
    txHash: Hex,
    options: WaitForReceiptOptions = {},
  ): Promise<EvmTransactionStatus> {
    const hash = parseHash(txHash, "transaction hash")
    const receipt = await pollUntil(
      async () => {
        const result = await this.client.call(
          "eth_getTransactionReceipt",
          [hash],
          EvmReceiptSchema.nullable(),
        )
        return result ?? undefined
      },
      {
        intervalMs: options.intervalMs ?? DEFAULT_RECEIPT_WAIT.intervalMs,
        timeoutMs: options.timeoutMs ?? DEFAULT_RECEIPT_WAIT.timeoutMs,
        description: `receipt of ${hash}`,
      },
    )

    const status: EvmTransactionStatus = {
      transactionHash: receipt.transactionHash,
      blockNumber: BigInt(receipt.blockNumber),
      status: receipt.status === "0x1" ? "success" : "reverted",
    }
    if (status.status === "reverted") {
      throw new RpcError(`Transaction ${hash} reverted`, "evm", {
        details: { txHash: hash, blockNumber: status.blockNumber.toString() },
      })
    }
    return status
  }
}

/**
 * Create an EVM gateway owning its own HTTP client (30 s default timeout)
 */
export function createEvmRpc(config: JsonRpcClientConfig): EvmRpc {
  return new EvmRpcGateway(config)
}
