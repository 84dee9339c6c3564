/**
 * NEAR JSON-RPC gateway
 */

import {
  encodeCryptoHash,
  encodeJsonArgs,
  JsonRpcClient,
  type JsonRpcClientConfig,
  type NearUnsignedTransaction,
  parseJsonPreservingIntegers,
  pollUntil,
  RpcError,
  toBase64,
} from "@bridge-driver/core"
import { z } from "zod"
import { type NearExecutionProof, normalizeLightClientProof } from "./proof.js"
import type { NearSigner } from "./signer.js"

const ViewResultSchema = z.object({
  result: z.array(z.number().int().min(0).max(255)).optional(),
  error: z.string().optional(),
  block_height: z.number().int().nonnegative(),
})

const OutcomeSchema = z.object({
  logs: z.array(z.string()),
  receipt_ids: z.array(z.string()),
  executor_id: z.string(),
  status: z.unknown(),
})

const OutcomeWithIdSchema = z.object({
  id: z.string(),
  block_hash: z.string(),
  outcome: OutcomeSchema,
})

export const TxStatusSchema = z.object({
  final_execution_status: z.string().optional(),
  status: z.unknown(),
  transaction_outcome: OutcomeWithIdSchema,
  receipts_outcome: z.array(OutcomeWithIdSchema),
})
export type NearTxStatus = z.infer<typeof TxStatusSchema>

const UnknownTransactionSchema = z.object({
  cause: z.object({ name: z.literal("UNKNOWN_TRANSACTION") }),
})

export interface ReceiptRef {
  receiptId: string
  receiverId: string
}

export interface WaitForOutcomeOptions {
  intervalMs?: number
  timeoutMs?: number
}

/**
 * Surface of a NEAR node used by the connectors
 */
export interface NearRpc {
  /** Call a view method at final finality and parse its JSON result */
  view(contractId: string, method: string, args: Record<string, unknown>): Promise<unknown>
  /** Sign and broadcast one function call, returning the transaction hash */
  change(
    signer: NearSigner,
    receiverId: string,
    method: string,
    args: Uint8Array,
    gas: bigint,
    deposit: bigint,
  ): Promise<string>
  /**
   * Execution proof of a receipt rooted at `lightClientHead`, a block hash the
   * EVM light client knows
   */
  getLightClientProof(receipt: ReceiptRef, lightClientHead: Uint8Array): Promise<NearExecutionProof>
  /** `undefined` while the node does not know the transaction */
  txStatus(txHash: string, senderId: string): Promise<NearTxStatus | undefined>
  waitForTxFinalOutcome(
    txHash: string,
    senderId: string,
    options?: WaitForOutcomeOptions,
  ): Promise<NearTxStatus>
}

const DEFAULT_OUTCOME_WAIT = { intervalMs: 2_000, timeoutMs: 500_000 }

class NearRpcGateway implements NearRpc {
  private readonly client: JsonRpcClient

  constructor(config: JsonRpcClientConfig) {
    this.client = new JsonRpcClient(config, "near")
  }

  async view(contractId: string, method: string, args: Record<string, unknown>): Promise<unknown> {
    const response = await this.client.call(
      "query",
      {
        request_type: "call_function",
        finality: "final",
        account_id: contractId,
        method_name: method,
        args_base64: toBase64(encodeJsonArgs(args)),
      },
      ViewResultSchema,
    )
    if (response.error !== undefined || response.result === undefined) {
      throw new RpcError(`${contractId}.${method}: ${response.error ?? "no result"}`, "near", {
        details: { contractId, method },
      })
    }

    const text = new TextDecoder().decode(Uint8Array.from(response.result))
    try {
      return parseJsonPreservingIntegers(text)
    } catch (error) {
      throw new RpcError(`${contractId}.${method}: result is not JSON`, "near", {
        details: { contractId, method },
        cause: error,
      })
    }
  }

  async change(
    signer: NearSigner,
    receiverId: string,
    method: string,
    args: Uint8Array,
    gas: bigint,
    deposit: bigint,
  ): Promise<string> {
    const unsigned: NearUnsignedTransaction = {
      type: "near",
      signerId: signer.accountId,
      receiverId,
      actions: [{ type: "FunctionCall", methodName: method, args, gas, deposit }],
    }
    return signer.sendTransaction(unsigned)
  }

  async getLightClientProof(receipt: ReceiptRef, lightClientHead: Uint8Array): Promise<NearExecutionProof> {
    const raw = await this.client.request("light_client_proof", {
      type: "receipt",
      receipt_id: receipt.receiptId,
      receiver_id: receipt.receiverId,
      light_client_head: encodeCryptoHash(lightClientHead),
    })
    return normalizeLightClientProof(raw)
  }

  async txStatus(txHash: string, senderId: string): Promise<NearTxStatus | undefined> {
    try {
      return await this.client.call(
        "tx",
        { tx_hash: txHash, sender_account_id: senderId, wait_until: "EXECUTED_OPTIMISTIC" },
        TxStatusSchema,
      )
    } catch (error) {
      if (error instanceof RpcError && UnknownTransactionSchema.safeParse(error.details?.["rpcError"]).success) {
        return undefined
      }
      throw error
    }
  }

  waitForTxFinalOutcome(
    txHash: string,
    senderId: string,
    options: WaitForOutcomeOptions = {},
  ): Promise<NearTxStatus> {
    return pollUntil(() => this.txStatus(txHash, senderId), {
      intervalMs: options.intervalMs ?? DEFAULT_OUTCOME_WAIT.intervalMs,
      timeoutMs: options.timeoutMs ?? DEFAULT_OUTCOME_WAIT.timeoutMs,
      description: `outcome of NEAR transaction ${txHash}`,
    })
  }
}

/**
 * Create a NEAR RPC gateway
 *
 * @example
 * ```typescript
 * const near = createNearRpc({ url: "https://rpc.testnet.near.org" })
 * const pending = await near.view("fast.testnet", "get_pending_transfer", { id: "7" })
 * ```
 */
export function createNearRpc(config: JsonRpcClientConfig): NearRpc {
  return new NearRpcGateway(config)
}
