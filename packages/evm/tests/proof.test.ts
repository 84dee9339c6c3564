import { RLP } from "@ethereumjs/rlp"
import { bytesToHex, InvalidInputError, ProofBuildError } from "@bridge-driver/core"
import { keccak256 } from "viem"
import { describe, expect, it, vi } from "vitest"
import { buildReceiptProof, buildReceiptTrieProof } from "../src/proof.js"
import { encodeBlockHeader, encodeLog, typedReceiptEncoding } from "../src/receipt.js"
import type { EvmRpc } from "../src/rpc.js"
import type { EvmBlockHeader, EvmReceipt } from "../src/types.js"
import { CUSTODIAN, hash, header, log, receipt } from "./fixtures.js"

const DEPOSIT_LOG = log(CUSTODIAN, [hash("ab")], `0x${(10n ** 18n).toString(16).padStart(64, "0")}`, "0x0")

// Legacy, EIP-1559 with one log, failed EIP-2930
const BLOCK_RECEIPTS: EvmReceipt[] = [
  receipt(0, { type: "0x0" }),
  receipt(1, { type: "0x2", logs: [DEPOSIT_LOG] }),
  receipt(2, { type: "0x1", status: "0x0" }),
]
const BLOCK_RECEIPTS_ROOT = "0x1e4f18800150ea8b18662ea5e4b61c30b46dfb0aa78196c3b28e2ab216317264"

function fakeRpc(blockHeader: EvmBlockHeader, receipts: EvmReceipt[] = BLOCK_RECEIPTS): EvmRpc {
  return {
    getBlockByNumber: vi.fn().mockResolvedValue(blockHeader),
    getTransactionReceipt: vi.fn(async (txHash: string) => {
      const found = receipts.find((r) => r.transactionHash === txHash)
      if (!found) {
        throw new InvalidInputError(`Transaction receipt not found for ${txHash}`)
      }
      return found
    }),
    getBlockReceipts: vi.fn().mockResolvedValue(receipts),
    getProof: vi.fn(),
    call: vi.fn(),
    waitForTransactionReceipt: vi.fn(),
  }
}

describe("buildReceiptTrieProof", () => {
  it("should compute the root of a single-receipt block", async () => {
    const only = receipt(0, { type: "0x0" })

    const { root } = await buildReceiptTrieProof([only], 0)

    // Leaf at key RLP(0) = 0x80: hex-prefix [0x20, 0x80]
    const leaf = RLP.encode([new Uint8Array([0x20, 0x80]), typedReceiptEncoding(only)])
    expect(bytesToHex(root)).toBe(keccak256(leaf))
    expect(bytesToHex(root)).toBe("0x056b23fbba480696b65fe5a59b8f2148a1299103c4f57df839233af2cf4ca2d2")
  })

  it("should match the receipts root of a block mixing receipt types", async () => {
    const { root, proof } = await buildReceiptTrieProof(BLOCK_RECEIPTS, 1)

    expect(bytesToHex(root)).toBe(BLOCK_RECEIPTS_ROOT)
    const [rootNode] = proof
    expect(rootNode && keccak256(rootNode)).toBe(BLOCK_RECEIPTS_ROOT)
  })
})

describe("buildReceiptProof", () => {
  it("should prove a log of a typed receipt", async () => {
    const blockHeader = header(BLOCK_RECEIPTS_ROOT)
    const rpc = fakeRpc(blockHeader)
    const target = BLOCK_RECEIPTS[1]
    if (!target) throw new Error("fixture")

    const proof = await buildReceiptProof(rpc, target.transactionHash, 0)

    expect(proof.logIndex).toBe(0n)
    expect(proof.receiptIndex).toBe(1n)
    expect(proof.logEntryData).toEqual(encodeLog(DEPOSIT_LOG))
    expect(proof.receiptData).toEqual(typedReceiptEncoding(target))
    expect(proof.headerData).toEqual(encodeBlockHeader(blockHeader))
    expect(proof.proof.length).toBeGreaterThan(0)
    expect(rpc.getBlockByNumber).toHaveBeenCalledWith(100n)
    expect(rpc.getBlockReceipts).toHaveBeenCalledWith(100n)
  })

  it("should refuse a block whose receipts root differs", async () => {
    const rpc = fakeRpc(header(hash("00")))
    const target = BLOCK_RECEIPTS[1]
    if (!target) throw new Error("fixture")

    const error = await buildReceiptProof(rpc, target.transactionHash, 0).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ProofBuildError)
    expect(error).toMatchObject({
      message: `Receipts root mismatch in block 100: computed ${BLOCK_RECEIPTS_ROOT}, header has ${hash("00")}`,
    })
  })

  it("should reject a log index outside the receipt", async () => {
    const rpc = fakeRpc(header(BLOCK_RECEIPTS_ROOT))
    const target = BLOCK_RECEIPTS[1]
    if (!target) throw new Error("fixture")

    await expect(buildReceiptProof(rpc, target.transactionHash, 1)).rejects.toThrow(
      `Log index 1 is out of range: receipt of ${target.transactionHash} has 1 logs`,
    )
    expect(rpc.getBlockReceipts).not.toHaveBeenCalled()
  })

  it("should fail when the block receipts miss the transaction", async () => {
    const target = BLOCK_RECEIPTS[1]
    if (!target) throw new Error("fixture")
    const rpc = fakeRpc(header(BLOCK_RECEIPTS_ROOT))
    vi.mocked(rpc.getBlockReceipts).mockResolvedValue([receipt(0, { type: "0x0" })])

    await expect(buildReceiptProof(rpc, target.transactionHash, 0)).rejects.toThrow(
      "Receipt 1 missing from block 100 receipts",
    )
  })
})
