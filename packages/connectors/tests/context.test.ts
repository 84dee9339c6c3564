import { defineSettings, InvalidInputError, type NearUnsignedTransaction } from "@bridge-driver/core"
import { beforeEach, describe, expect, it, vi } from "vitest"
import { ConnectorContext } from "../src/context.js"
import { fakeNearRpc, fakeNearSigner, RELAYER, SETTINGS } from "./fakes.js"

// Mock near-kit
const mockNearConstructor = vi.fn()
vi.mock("near-kit", async (importOriginal) => {
  const actual = await importOriginal<typeof import("near-kit")>()
  return {
    ...actual,
    Near: class {
      constructor(config: unknown) {
        mockNearConstructor(config)
      }
    },
  }
})

const NEAR_KEY = "ed25519:TestSecretKey"

function call(methodName: string) {
  return { type: "FunctionCall" as const, methodName, args: new Uint8Array([1]), gas: 5n, deposit: 0n }
}

describe("ConnectorContext", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("should build the NEAR signer against the configured rpc endpoint", () => {
    const ctx = new ConnectorContext({ settings: defineSettings({ ...SETTINGS, nearPrivateKey: NEAR_KEY }) }, "test")

    const signer = ctx.nearSigner()

    expect(signer.accountId).toBe(RELAYER)
    expect(mockNearConstructor).toHaveBeenCalledWith({
      network: "testnet",
      rpcUrl: "http://near.test",
      privateKey: NEAR_KEY,
      defaultSignerId: RELAYER,
    })
  })

  it("should build the NEAR signer once", () => {
    const ctx = new ConnectorContext({ settings: defineSettings({ ...SETTINGS, nearPrivateKey: NEAR_KEY }) }, "test")

    expect(ctx.nearSigner()).toBe(ctx.nearSigner())
    expect(mockNearConstructor).toHaveBeenCalledTimes(1)
  })

  it("should submit function calls through the NEAR gateway", async () => {
    const near = fakeNearRpc()
    const nearSigner = fakeNearSigner("hash")
    const ctx = new ConnectorContext({ settings: SETTINGS, near, nearSigner }, "test")
    const tx: NearUnsignedTransaction = {
      type: "near",
      signerId: RELAYER,
      receiverId: "locker.testnet",
      actions: [call("claim_fee")],
    }

    await expect(ctx.sendNear(tx)).resolves.toBe("hash")
    expect(near.change).toHaveBeenCalledWith(nearSigner, "locker.testnet", "claim_fee", new Uint8Array([1]), 5n, 0n)
  })

  it("should refuse transactions with several actions", () => {
    const near = fakeNearRpc()
    const ctx = new ConnectorContext({ settings: SETTINGS, near, nearSigner: fakeNearSigner() }, "test")
    const tx: NearUnsignedTransaction = {
      type: "near",
      signerId: RELAYER,
      receiverId: "locker.testnet",
      actions: [call("a"), call("b")],
    }

    expect(() => ctx.sendNear(tx)).toThrow(
      new InvalidInputError("Expected one function call to locker.testnet, got 2"),
    )
    expect(near.change).not.toHaveBeenCalled()
  })
})
