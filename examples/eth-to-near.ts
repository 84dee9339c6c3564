#!/usr/bin/env node

/**
 * Ethereum to NEAR coin deposit example
 *
 * The first run locks ETH in the custodian and waits for the transaction to be
 * mined. The NEAR eth connector only accepts the proof once the Ethereum client
 * on NEAR has synced past the deposit block, so the second run, with DEPOSIT_TX
 * set, proves the deposit log on NEAR and waits for the mint.
 *
 * Setup:
 * 1. Set EVM_PRIVATE_KEY, NEAR_PRIVATE_KEY and NEAR_SIGNER_ID
 * 2. Set ETH_CUSTODIAN_ADDRESS and ETH_CONNECTOR_ACCOUNT_ID
 *
 * Usage:
 *   RECIPIENT=alice.testnet npx tsx examples/eth-to-near.ts
 *   DEPOSIT_TX=0x... npx tsx examples/eth-to-near.ts
 */

import { defineSettings, errorMessage, parseHash, requireSetting } from "@bridge-driver/core"
import { EthConnector } from "@bridge-driver/connectors"
import { createEvmRpc } from "@bridge-driver/evm"
import { createNearRpc } from "@bridge-driver/near"
import { parseEther } from "viem"

const RECIPIENT = process.env["RECIPIENT"] ?? "alice.testnet"
const AMOUNT = process.env["AMOUNT"] ?? "0.01"
const DEPOSIT_TX = process.env["DEPOSIT_TX"]

async function main() {
  const settings = defineSettings({
    evmRpcUrl: process.env["EVM_RPC_URL"] ?? "https://ethereum-sepolia-rpc.publicnode.com",
    evmChainId: 11155111,
    evmPrivateKey: process.env["EVM_PRIVATE_KEY"],
    nearRpcUrl: process.env["NEAR_RPC_URL"] ?? "https://rpc.testnet.near.org",
    nearNetwork: "testnet",
    nearSignerId: process.env["NEAR_SIGNER_ID"],
    nearPrivateKey: process.env["NEAR_PRIVATE_KEY"],
    ethCustodianAddress: process.env["ETH_CUSTODIAN_ADDRESS"],
    ethConnectorAccountId: process.env["ETH_CONNECTOR_ACCOUNT_ID"],
  })
  const evm = createEvmRpc({ url: requireSetting(settings, "evmRpcUrl") })
  const near = createNearRpc({ url: requireSetting(settings, "nearRpcUrl") })
  const connector = new EthConnector({ settings, evm, near })

  if (DEPOSIT_TX === undefined) {
    console.log("\n=== Step 1: Deposit ===")
    const txHash = await connector.depositToNear(parseEther(AMOUNT), RECIPIENT)
    console.log(`Deposit tx: ${txHash}`)

    const mined = await evm.waitForTransactionReceipt(txHash)
    console.log(`Mined in block ${mined.blockNumber}`)
    console.log("Run again with DEPOSIT_TX set once the Ethereum client on NEAR has passed that block")
    return
  }

  console.log("\n=== Step 2: Finalize on NEAR ===")
  const nearTxHash = await connector.finalizeDeposit(parseHash(DEPOSIT_TX, "DEPOSIT_TX"), 0)
  console.log(`Finalize tx: ${nearTxHash}`)

  const outcome = await near.waitForTxFinalOutcome(nearTxHash, requireSetting(settings, "nearSignerId"))
  console.log(`Finalize status: ${outcome.final_execution_status ?? "unknown"}`)
}

main().catch((error: unknown) => {
  console.error(errorMessage(error))
  process.exit(1)
})
