import { describe, expect, it } from "vitest"
import { defineSettings, OPERATION_REQUIREMENTS, requireSetting, requireSettings } from "../src/config.js"
import { ConfigurationError } from "../src/errors.js"

const CUSTODIAN = "0x1111111111111111111111111111111111111111"

describe("defineSettings", () => {
  it("should accept an empty record", () => {
    expect(defineSettings({})).toEqual({})
  })

  it("should freeze the validated settings", () => {
    const settings = defineSettings({ evmRpcUrl: "http://localhost:8545", ethCustodianAddress: CUSTODIAN })

    expect(Object.isFrozen(settings)).toBe(true)
    expect(settings.ethCustodianAddress).toBe(CUSTODIAN)
  })

  it("should name the malformed field", () => {
    expect(() => defineSettings({ ethCustodianAddress: "0x1234" })).toThrow(
      'Invalid setting "ethCustodianAddress": expected a 20-byte hex address',
    )
  })

  it("should reject unknown fields", () => {
    expect(() => defineSettings({ custodian: CUSTODIAN })).toThrow(ConfigurationError)
  })

  it("should reject NEAR keys without the curve prefix", () => {
    expect(() => defineSettings({ nearPrivateKey: "test-secret" })).toThrow(
      'Invalid setting "nearPrivateKey": expected an ed25519: prefixed base58 key',
    )
  })
})

describe("requireSettings", () => {
  it("should return the settings when every requirement is present", () => {
    const settings = defineSettings({ evmRpcUrl: "http://localhost:8545", ethCustodianAddress: CUSTODIAN })

    const checked = requireSettings(settings, "ethConnector.depositToNear")

    expect(checked.ethCustodianAddress).toBe(CUSTODIAN)
  })

  it("should report the first missing setting by its label", () => {
    const settings = defineSettings({ evmRpcUrl: "http://localhost:8545" })

    expect(() => requireSettings(settings, "ethConnector.depositToNear")).toThrow(
      "Eth custodian address is not set",
    )
  })

  it("should list the light client for every EVM-side NEAR proof consumer", () => {
    for (const op of ["ethConnector.finalizeWithdraw", "nep141.deployToken", "nep141.finalizeDeposit"] as const) {
      expect(OPERATION_REQUIREMENTS[op]).toContain("nearLightClientAddress")
    }
  })
})

describe("requireSetting", () => {
  it("should return a present value", () => {
    expect(requireSetting(defineSettings({ evmChainId: 11155111 }), "evmChainId")).toBe(11155111)
  })

  it("should throw for a missing value", () => {
    expect(() => requireSetting(defineSettings({}), "nearSignerId")).toThrow("Near signer account id is not set")
  })
})
