/**
 * Events the locker writes to NEAR receipt logs
 */

import { errorMessage, InvalidInputError } from "@bridge-driver/core"
import { z } from "zod"
import type { NearTxStatus } from "./rpc.js"
import { MPCSignature, type SignTransferEvent } from "./types.js"

const SignTransferEventLogSchema = z.object({
  SignTransferEvent: z.object({
    message_payload: z.object({
      nonce: z.string(),
      token: z.string(),
      amount: z.string(),
      recipient: z.string(),
      fee_recipient: z.string().nullable(),
    }),
    signature: z.object({
      big_r: z.object({ affine_point: z.string() }),
      s: z.object({ scalar: z.string() }),
      recovery_id: z.number().int().nonnegative(),
    }),
  }),
})

/**
 * Parse a SignTransferEvent from JSON string
 *
 * @throws {InvalidInputError} if the log is not a SignTransferEvent
 */
export function parseSignTransferEvent(json: string): SignTransferEvent {
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch (error) {
    throw new InvalidInputError(`SignTransferEvent log is not JSON: ${errorMessage(error)}`, { cause: error })
  }
  const parsed = SignTransferEventLogSchema.safeParse(value)
  if (!parsed.success) {
    throw new InvalidInputError("Malformed SignTransferEvent log", {
      details: { issues: parsed.error.issues },
    })
  }
  const { message_payload, signature } = parsed.data.SignTransferEvent
  return {
    message_payload,
    signature: MPCSignature.fromRaw(signature),
  }
}

/**
 * First SignTransferEvent among the receipt outcome logs of a transaction
 */
export function findSignTransferEvent(status: NearTxStatus): SignTransferEvent | undefined {
  const log = status.receipts_outcome
    .flatMap((receipt) => receipt.outcome.logs)
    .find((line) => line.includes("SignTransferEvent"))
  return log === undefined ? undefined : parseSignTransferEvent(log)
}
