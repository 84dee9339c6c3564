/**
 * Contract ABIs for EVM bridge interactions
 */

export const ETH_CUSTODIAN_ABI = [
  {
    name: "depositToNear",
    type: "function",
    stateMutability: "payable",
    inputs: [
      { name: "nearRecipientAccountId", type: "string" },
      { name: "fee", type: "uint256" },
    ],
    outputs: [],
  },
  {
    name: "depositToEVM",
    type: "function",
    stateMutability: "payable",
    inputs: [
      { name: "ethRecipientOnNear", type: "string" },
      { name: "fee", type: "uint256" },
    ],
    outputs: [],
  },
  {
    name: "withdraw",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "proofData", type: "bytes" },
      { name: "proofBlockHeight", type: "uint64" },
    ],
    outputs: [],
  },
] as const

export const BRIDGE_TOKEN_FACTORY_ABI = [
  {
    name: "newBridgeToken",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "proofData", type: "bytes" },
      { name: "proofBlockHeight", type: "uint64" },
    ],
    outputs: [
      { name: "", type: "address" },
    ],
  },
  {
    name: "deposit",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "proofData", type: "bytes" },
      { name: "proofBlockHeight", type: "uint64" },
    ],
    outputs: [],
  },
  {
    name: "withdraw",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "token", type: "string" },
      { name: "amount", type: "uint128" },
      { name: "recipient", type: "string" },
    ],
    outputs: [],
  },
  {
    name: "nearToEthToken",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "nearTokenId", type: "string" }],
    outputs: [{ name: "", type: "address" }],
  },
] as const

/**
 * Signature-verifying deposit of the factory. Kept apart from the proof-based
 * `deposit(bytes,uint64)` so viem never has to resolve an overload.
 */
export const BRIDGE_TOKEN_FACTORY_SIGNED_ABI = [
  {
    name: "deposit",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "signatureData", type: "bytes" },
      {
        name: "bridgeDeposit",
        type: "tuple",
        components: [
          { name: "nonce", type: "uint128" },
          { name: "token", type: "string" },
          { name: "amount", type: "uint128" },
          { name: "recipient", type: "address" },
          { name: "feeRecipient", type: "string" },
        ],
      },
    ],
    outputs: [],
  },
] as const

export const ERC20_ABI = [
  {
    name: "approve",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "spender", type: "address" },
      { name: "amount", type: "uint256" },
    ],
    outputs: [{ name: "", type: "bool" }],
  },
  {
    name: "allowance",
    type: "function",
    stateMutability: "view",
    inputs: [
      { name: "owner", type: "address" },
      { name: "spender", type: "address" },
    ],
    outputs: [{ name: "", type: "uint256" }],
  },
] as const

export const FAST_BRIDGE_ABI = [
  {
    name: "transferTokens",
    type: "function",
    stateMutability: "payable",
    inputs: [
      { name: "_token", type: "address" },
      { name: "_recipient", type: "address" },
      { name: "_nonce", type: "uint256" },
      { name: "_amount", type: "uint256" },
      { name: "_unlock_recipient", type: "string" },
      { name: "_valid_till_block_height", type: "uint256" },
    ],
    outputs: [],
  },
] as const

export const NEAR_LIGHT_CLIENT_ABI = [
  {
    name: "bridgeState",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [
      { name: "currentHeight", type: "uint256" },
      { name: "nextTimestamp", type: "uint256" },
      { name: "nextValidAt", type: "uint256" },
      { name: "numBlockProducers", type: "uint256" },
    ],
  },
  {
    name: "blockHashes",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "height", type: "uint64" }],
    outputs: [{ name: "", type: "bytes32" }],
  },
] as const
