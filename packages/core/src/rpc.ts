/**
 * JSON-RPC 2.0 over HTTP
 *
 * One client per gateway instance. Requests are single-shot: no retry, no caching.
 */

import type { z } from "zod"
import { RpcError, type RpcChain } from "./errors.js"
import { createLogger, type Logger } from "./logger.js"

export const DEFAULT_RPC_TIMEOUT_MS = 30_000

export interface JsonRpcClientConfig {
  url: string
  timeoutMs?: number
  headers?: Record<string, string>
}

export interface JsonRpcErrorObject {
  code: number
  message: string
  data?: unknown
}

type JsonRpcResponse = {
  jsonrpc?: string
  id?: string | number | null
  result?: unknown
  error?: JsonRpcErrorObject
}

function isJsonRpcResponse(value: unknown): value is JsonRpcResponse {
  return typeof value === "object" && value !== null && ("result" in value || "error" in value)
}

/**
 * JSON-RPC error objects returned by the node end up in `RpcError.details.rpcError`,
 * where gateways can map known conditions.
 */
export class JsonRpcClient {
  private readonly logger: Logger
  private readonly timeoutMs: number

  constructor(
    private readonly config: JsonRpcClientConfig,
    readonly chain: RpcChain,
  ) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS
    this.logger = createLogger(`${chain}-rpc`)
  }

  get url(): string {
    return this.config.url
  }

  /**
   * Call `method` and validate the result against `schema`.
   * Unknown object fields in the result are dropped by the schema.
   */
  async call<T extends z.ZodType>(method: string, params: unknown, schema: T): Promise<z.infer<T>> {
    const result = await this.request(method, params)
    const parsed = schema.safeParse(result)
    if (!parsed.success) {
      throw new RpcError(`${method}: malformed response`, this.chain, {
        details: { method, issues: parsed.error.issues },
        cause: parsed.error,
      })
    }
    return parsed.data
  }

  /**
   * Raw result of `method`. A `null` result is returned as is.
   */
  async request(method: string, params: unknown): Promise<unknown> {
    this.logger.debug("rpc request", { method })

    let response: Response
    try {
      response = await fetch(this.config.url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          ...(this.config.headers ?? {}),
        },
        body: JSON.stringify({ jsonrpc: "2.0", id: "1", method, params }),
        signal: AbortSignal.timeout(this.timeoutMs),
      })
    } catch (error) {
      throw new RpcError(`${method}: request failed`, this.chain, {
        details: { method, url: this.config.url },
        cause: error,
      })
    }

    if (!response.ok) {
      throw new RpcError(
        `${method}: request failed: ${response.status} ${response.statusText}`,
        this.chain,
        { details: { method, status: response.status } },
      )
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new RpcError(`${method}: response is not JSON`, this.chain, { details: { method }, cause: error })
    }

    if (!isJsonRpcResponse(body)) {
      throw new RpcError(`${method}: response has neither result nor error`, this.chain, {
        details: { method },
      })
    }
    if (body.error) {
      throw new RpcError(`${method}: ${body.error.message}`, this.chain, {
        details: { method, rpcError: body.error },
      })
    }
    return body.result
  }
}
