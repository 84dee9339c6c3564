import {
  bytesToHex,
  ConfigurationError,
  defineSettings,
  type Hex,
  LightClientLagError,
  type NearUnsignedTransaction,
} from "@bridge-driver/core"
import {
  buildReceiptTrieProof,
  encodeBlockHeader,
  encodeLog,
  ETH_CUSTODIAN_ABI,
  type EvmBlockHeader,
  type EvmLog,
  type EvmReceipt,
  typedReceiptEncoding,
} from "@bridge-driver/evm"
import { GAS, serializeNearProof } from "@bridge-driver/near"
import { decodeFunctionData } from "viem"
import { describe, expect, it, vi } from "vitest"
import { EthConnector } from "../src/eth-connector.js"
import {
  fakeEvmRpc,
  fakeEvmSigner,
  fakeLightClient,
  fakeNearRpc,
  fakeNearSigner,
  nearProofAt,
  RECEIPT_ID,
  SETTINGS,
} from "./fakes.js"

const DEPOSIT_TX: Hex = `0xabc${"0".repeat(61)}`
const CUSTODIAN = "0x1111111111111111111111111111111111111111"

const DEPOSIT_LOG: EvmLog = {
  address: CUSTODIAN,
  topics: [`0x${"ab".repeat(32)}`],
  data: `0x${"00".repeat(24)}0de0b6b3a7640000`,
  logIndex: "0x0",
}

const DEPOSIT_RECEIPT: EvmReceipt = {
  transactionHash: DEPOSIT_TX,
  transactionIndex: "0x0",
  blockHash: `0x${"bb".repeat(32)}`,
  blockNumber: "0x64",
  type: "0x2",
  status: "0x1",
  cumulativeGasUsed: "0x5208",
  logsBloom: `0x${"00".repeat(256)}`,
  logs: [DEPOSIT_LOG],
}

function headerWithRoot(receiptsRoot: Hex): EvmBlockHeader {
  return {
    hash: `0x${"bb".repeat(32)}`,
    parentHash: `0x${"aa".repeat(32)}`,
    sha3Uncles: "0x1dcc4de8dec75d7aab85b567b6ccd41ad312451b948a7413f0a142fd40d49347",
    miner: "0x0000000000000000000000000000000000000000",
    stateRoot: `0x${"cc".repeat(32)}`,
    transactionsRoot: `0x${"dd".repeat(32)}`,
    receiptsRoot,
    logsBloom: `0x${"00".repeat(256)}`,
    difficulty: "0x0",
    number: "0x64",
    gasLimit: "0x1c9c380",
    gasUsed: "0x5208",
    timestamp: "0x65f0a000",
    extraData: "0x",
    mixHash: `0x${"ee".repeat(32)}`,
    nonce: "0x0000000000000000",
    baseFeePerGas: "0x7",
  }
}

function sentNearTx(signer: ReturnType<typeof fakeNearSigner>): NearUnsignedTransaction {
  const tx = vi.mocked(signer.sendTransaction).mock.calls[0]?.[0]
  if (!tx) {
    throw new Error("nothing was sent to NEAR")
  }
  return tx
}

describe("EthConnector", () => {
  it("should lock the deposit amount in the custodian", async () => {
    const evmSigner = fakeEvmSigner(DEPOSIT_TX)
    const connector = new EthConnector({ settings: SETTINGS, evmSigner })

    await expect(connector.depositToNear(10n ** 18n, "alice.testnet")).resolves.toBe(DEPOSIT_TX)

    const tx = vi.mocked(evmSigner.sendTransaction).mock.calls[0]?.[0]
    expect(tx).toMatchObject({ to: CUSTODIAN, value: 10n ** 18n, chainId: 11155111 })
    expect(decodeFunctionData({ abi: ETH_CUSTODIAN_ABI, data: tx?.data ?? "0x" })).toEqual({
      functionName: "depositToNear",
      args: ["alice.testnet", 0n],
    })
  })

  it("should finalize a deposit with the Borsh receipt proof", async () => {
    const { root } = await buildReceiptTrieProof([DEPOSIT_RECEIPT], 0)
    const header = headerWithRoot(bytesToHex(root))
    const evm = fakeEvmRpc()
    vi.mocked(evm.getTransactionReceipt).mockResolvedValue(DEPOSIT_RECEIPT)
    vi.mocked(evm.getBlockByNumber).mockResolvedValue(header)
    vi.mocked(evm.getBlockReceipts).mockResolvedValue([DEPOSIT_RECEIPT])
    const near = fakeNearRpc()
    const nearSigner = fakeNearSigner()
    const connector = new EthConnector({ settings: SETTINGS, evm, near, nearSigner })

    await expect(connector.finalizeDeposit(DEPOSIT_TX, 0)).resolves.toBe("near-tx-hash")

    expect(near.change).toHaveBeenCalledWith(
      nearSigner,
      "connector.testnet",
      "deposit",
      expect.any(Uint8Array),
      300_000_000_000_000n,
      0n,
    )

    const tx = sentNearTx(nearSigner)
    const [action] = tx.actions
    expect(tx.receiverId).toBe("connector.testnet")
    expect(action).toMatchObject({ methodName: "deposit", gas: 300_000_000_000_000n, deposit: 0n })

    // log_index u64, log_entry_data, receipt_index u64, receipt_data, then the header length prefix
    const args = action?.args ?? new Uint8Array()
    const headerOffset = 8 + 4 + encodeLog(DEPOSIT_LOG).length + 8 + 4 + typedReceiptEncoding(DEPOSIT_RECEIPT).length
    const view = new DataView(args.buffer, args.byteOffset, args.byteLength)
    expect(view.getUint32(headerOffset, true)).toBe(encodeBlockHeader(header).length)
  })

  it("should burn the bridged coin for an EVM recipient", async () => {
    const nearSigner = fakeNearSigner()
    const connector = new EthConnector({ settings: SETTINGS, nearSigner })

    await connector.withdraw(1000n, "0x5555555555555555555555555555555555555555")

    const tx = sentNearTx(nearSigner)
    expect(tx.receiverId).toBe("connector.testnet")
    expect(tx.actions[0]).toMatchObject({ methodName: "withdraw", gas: GAS.DEFAULT, deposit: 1n })
    expect(bytesToHex(tx.actions[0]?.args ?? new Uint8Array())).toBe(`0x${"55".repeat(20)}e803${"00".repeat(14)}`)
  })

  it("should finalize a withdrawal at the light client height", async () => {
    const proof = nearProofAt(9_000n)
    const near = fakeNearRpc()
    vi.mocked(near.getLightClientProof).mockResolvedValue(proof)
    const lightClient = fakeLightClient(10_000n)
    const evmSigner = fakeEvmSigner(`0x${"cd".repeat(32)}`)
    const connector = new EthConnector({ settings: SETTINGS, near, lightClient, evmSigner })

    await connector.finalizeWithdraw(RECEIPT_ID)

    expect(lightClient.blockHash).toHaveBeenCalledWith(10_000n)
    expect(near.getLightClientProof).toHaveBeenCalledWith(
      { receiptId: RECEIPT_ID, receiverId: "connector.testnet" },
      new Uint8Array(32).fill(0xab),
    )
    const tx = vi.mocked(evmSigner.sendTransaction).mock.calls[0]?.[0]
    expect(tx?.to).toBe(CUSTODIAN)
    expect(decodeFunctionData({ abi: ETH_CUSTODIAN_ABI, data: tx?.data ?? "0x" })).toEqual({
      functionName: "withdraw",
      args: [bytesToHex(serializeNearProof(proof)), 10_000n],
    })
  })

  it("should report light client lag without submitting", async () => {
    const near = fakeNearRpc()
    vi.mocked(near.getLightClientProof).mockResolvedValue(nearProofAt(7n))
    const evmSigner = fakeEvmSigner()
    const connector = new EthConnector({ settings: SETTINGS, near, lightClient: fakeLightClient(5n), evmSigner })

    const error = await connector.finalizeWithdraw(RECEIPT_ID).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(LightClientLagError)
    expect(error).toMatchObject({ requiredHeight: 7n, syncHeight: 5n, code: "LIGHT_CLIENT_LAG" })
    expect(evmSigner.sendTransaction).not.toHaveBeenCalled()
  })

  it("should reject receipt ids that are not crypto hashes", async () => {
    const lightClient = fakeLightClient(5n)
    const connector = new EthConnector({ settings: SETTINGS, near: fakeNearRpc(), lightClient, evmSigner: fakeEvmSigner() })

    await expect(connector.finalizeWithdraw("not-a-receipt")).rejects.toThrow("receipt id")
    expect(lightClient.syncHeight).not.toHaveBeenCalled()
  })

  it("should name the first missing setting", async () => {
    const connector = new EthConnector({ settings: defineSettings({ evmRpcUrl: "http://evm.test" }) })

    await expect(connector.depositToNear(1n, "alice.testnet")).rejects.toThrow(
      new ConfigurationError("Eth custodian address is not set"),
    )
  })
})
