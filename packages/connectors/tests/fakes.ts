import { defineSettings, type Hex, hexToBytes, type Settings } from "@bridge-driver/core"
import type { EvmRpc, EvmSigner, NearLightClient } from "@bridge-driver/evm"
import {
  deserializeNearProof,
  type NearExecutionProof,
  type NearRpc,
  type NearSigner,
} from "@bridge-driver/near"
import { vi } from "vitest"
import fixtures from "../../near/tests/fixtures/light-client-proofs.json" with { type: "json" }

export const CHAIN_ID = 11155111
export const RELAYER = "relayer.testnet"
export const EVM_SENDER: Hex = "0x9999999999999999999999999999999999999999"
export const RECEIPT_ID = "33VTTr5uPD1yUQuxnZYuoxTHrMQ9sND5msVEbtK1kc24"
export const LIGHT_CLIENT_HEAD: Hex = `0x${"ab".repeat(32)}`

export const SETTINGS: Settings = defineSettings({
  evmRpcUrl: "http://evm.test",
  evmChainId: CHAIN_ID,
  nearRpcUrl: "http://near.test",
  nearNetwork: "testnet",
  nearSignerId: RELAYER,
  ethCustodianAddress: "0x1111111111111111111111111111111111111111",
  ethConnectorAccountId: "connector.testnet",
  bridgeTokenFactoryAddress: "0x2222222222222222222222222222222222222222",
  tokenLockerId: "locker.testnet",
  nearLightClientAddress: "0x6666666666666666666666666666666666666666",
  fastBridgeAddress: "0x3333333333333333333333333333333333333333",
  fastBridgeAccountId: "fast.testnet",
})

export function fakeEvmRpc(): EvmRpc {
  return {
    getBlockByNumber: vi.fn(),
    getTransactionReceipt: vi.fn(),
    getBlockReceipts: vi.fn(),
    getProof: vi.fn(),
    call: vi.fn(),
    waitForTransactionReceipt: vi.fn(),
  }
}

export function fakeNearRpc(): NearRpc {
  return {
    view: vi.fn(),
    // Hands the call to the signer like the gateway does
    change: vi.fn<NearRpc["change"]>((signer, receiverId, methodName, args, gas, deposit) =>
      signer.sendTransaction({
        type: "near",
        signerId: signer.accountId,
        receiverId,
        actions: [{ type: "FunctionCall", methodName, args, gas, deposit }],
      }),
    ),
    getLightClientProof: vi.fn(),
    txStatus: vi.fn(),
    waitForTxFinalOutcome: vi.fn(),
  }
}

export function fakeLightClient(height: bigint): NearLightClient {
  return {
    syncHeight: vi.fn().mockResolvedValue(height),
    blockHash: vi.fn().mockResolvedValue(LIGHT_CLIENT_HEAD),
  }
}

export function fakeEvmSigner(...hashes: Hex[]): EvmSigner {
  const sendTransaction = vi.fn()
  for (const hash of hashes) {
    sendTransaction.mockResolvedValueOnce(hash)
  }
  return { address: EVM_SENDER, chainId: CHAIN_ID, sendTransaction }
}

export function fakeNearSigner(hash = "near-tx-hash"): NearSigner {
  return { accountId: RELAYER, sendTransaction: vi.fn().mockResolvedValue(hash) }
}

/**
 * First fixture proof moved to `height`
 */
export function nearProofAt(height: bigint): NearExecutionProof {
  const [fixture] = fixtures.proofs
  if (!fixture) {
    throw new Error("No light client proof fixture")
  }
  const proof = deserializeNearProof(hexToBytes(fixture.hex))
  return {
    ...proof,
    block_header_lite: {
      ...proof.block_header_lite,
      inner_lite: { ...proof.block_header_lite.inner_lite, height },
    },
  }
}
