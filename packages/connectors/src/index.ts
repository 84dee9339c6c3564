/**
 * @bridge-driver/connectors
 *
 * Bridging flows between an EVM chain and NEAR built on the chain packages
 */

export { ConnectorContext, type ConnectorDeps, type GatedNearProof } from "./context.js"
export { EthConnector } from "./eth-connector.js"
export { defaultValidTill, FastBridge, type FastBridgeTransferParams } from "./fast-bridge.js"
export { Nep141Connector, SIGN_TRANSFER_POLL } from "./nep141-connector.js"
