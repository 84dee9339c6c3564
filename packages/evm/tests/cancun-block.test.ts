import { bytesToHex } from "@bridge-driver/core"
import { http, HttpResponse } from "msw"
import { setupServer } from "msw/node"
import { keccak256 } from "viem"
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest"
import { z } from "zod"
import { buildReceiptProof, buildReceiptTrieProof } from "../src/proof.js"
import { encodeBlockHeader } from "../src/receipt.js"
import { createEvmRpc } from "../src/rpc.js"
import fixture from "./fixtures/cancun-block.json" with { type: "json" }

// Post-Cancun block: legacy, EIP-2930, EIP-1559 and blob receipts, one of them failed
const RPC_URL = "http://evm.test"
const BLOCK_HASH = "0xaa604dd7f00a1c8a6367d5ca2373de4389852171ae81a62b01714f84d7992da2"
const RECEIPTS_ROOT = "0xf11ac8d531970d40c93c2ddccb119f9ff7770774eafd3ee56ab0fb56363b4bdd"
const HEIGHT = BigInt(fixture.block.number)

const RpcRequestSchema = z.object({ method: z.string(), params: z.array(z.unknown()) })

const server = setupServer(
  http.post(RPC_URL, async ({ request }) => {
    const { method, params } = RpcRequestSchema.parse(await request.json())
    let result: unknown = null
    switch (method) {
      case "eth_getBlockByNumber":
        result = params[0] === fixture.block.number ? fixture.block : null
        break
      case "eth_getBlockReceipts":
        result = params[0] === fixture.block.number ? fixture.receipts : null
        break
      case "eth_getTransactionReceipt":
        result = fixture.receipts.find((r) => r.transactionHash === params[0]) ?? null
        break
    }
    return HttpResponse.json({ jsonrpc: "2.0", id: "1", result })
  }),
)

beforeAll(() => server.listen({ onUnhandledRequest: "error" }))
afterEach(() => server.resetHandlers())
afterAll(() => server.close())

function receiptAt(index: number) {
  const receipt = fixture.receipts[index]
  if (!receipt) {
    throw new Error(`No receipt ${index} in the block fixture`)
  }
  return receipt
}

describe("post-Cancun block", () => {
  const rpc = createEvmRpc({ url: RPC_URL })

  it("should hash the encoded header to the block hash", async () => {
    const header = await rpc.getBlockByNumber(HEIGHT)

    expect(header.withdrawalsRoot).toBe(fixture.block.withdrawalsRoot)
    expect(header.blobGasUsed).toBe("0x20000")
    expect(header.excessBlobGas).toBe("0x0")
    expect(header.parentBeaconBlockRoot).toBe(fixture.block.parentBeaconBlockRoot)
    expect(keccak256(encodeBlockHeader(header))).toBe(BLOCK_HASH)
    expect(fixture.block.hash).toBe(BLOCK_HASH)
  })

  it("should rebuild the block's receipts root", async () => {
    const receipts = await rpc.getBlockReceipts(HEIGHT)

    const { root } = await buildReceiptTrieProof(receipts, 4)

    expect(receipts.map((r) => r.type)).toEqual(["0x0", "0x2", "0x3", "0x2", "0x2", "0x1"])
    expect(bytesToHex(root)).toBe(RECEIPTS_ROOT)
    expect(fixture.block.receiptsRoot).toBe(RECEIPTS_ROOT)
  })

  it("should prove a deposit log against the recorded header", async () => {
    const proof = await buildReceiptProof(rpc, receiptAt(4).transactionHash, 0)

    expect(proof.receiptIndex).toBe(4n)
    expect(proof.logIndex).toBe(0n)
    expect(keccak256(proof.headerData)).toBe(BLOCK_HASH)
    expect(proof.proof[0] && keccak256(proof.proof[0])).toBe(RECEIPTS_ROOT)
    expect(proof.receiptData[0]).toBe(0x02)
    expect(proof.receiptData).toHaveLength(585)
    expect(bytesToHex(proof.logEntryData)).toBe(
      "0xf89b940855490405ba2f955146061cd4bda5cb5d9fd01ff842a06475a0fb39228bcd514c47a12d96c82e626d433300bad554cb3b0ed0d0b06839a00000000000000000000000002c52130a69b3254240c961f6acfb09713f4f9cc1b8400000000000000000000000000000000000000000000000000de0b6b3a76400000000000000000000000000000000000000000000000000000000000000000000",
    )
  })

  it.each([
    [1, 0],
    [4, 1],
    [5, 0],
  ])("should prove receipt %i log %i against the recorded root", async (index, logIndex) => {
    const proof = await buildReceiptProof(rpc, receiptAt(index).transactionHash, logIndex)

    expect(proof.receiptIndex).toBe(BigInt(index))
    expect(proof.proof[0] && keccak256(proof.proof[0])).toBe(RECEIPTS_ROOT)
    expect(keccak256(proof.headerData)).toBe(BLOCK_HASH)
  })
})
