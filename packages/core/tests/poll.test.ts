import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import { FinalizationTimeoutError } from "../src/errors.js"
import { pollUntil } from "../src/utils/poll.js"

describe("pollUntil", () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("should return the first defined value without waiting", async () => {
    const fn = vi.fn().mockResolvedValue("done")

    await expect(pollUntil(fn, { intervalMs: 2_000, timeoutMs: 10_000 })).resolves.toBe("done")
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it("should keep polling until a value appears", async () => {
    const fn = vi
      .fn<() => Promise<string | undefined>>()
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce(undefined)
      .mockResolvedValueOnce("found")

    const result = pollUntil(fn, { intervalMs: 2_000, timeoutMs: 10_000 })
    await vi.advanceTimersByTimeAsync(4_000)

    await expect(result).resolves.toBe("found")
    expect(fn).toHaveBeenCalledTimes(3)
  })

  it("should time out after the deadline", async () => {
    const fn = vi.fn<() => Promise<string | undefined>>().mockResolvedValue(undefined)

    const result = pollUntil(fn, { intervalMs: 2_000, timeoutMs: 500_000, description: "SignTransferEvent" })
    const assertion = expect(result).rejects.toThrow(
      new FinalizationTimeoutError("Timed out after 500s waiting for SignTransferEvent", 500_000),
    )
    await vi.advanceTimersByTimeAsync(500_000)
    await assertion

    // Polls at 0, 2s, ..., 500s
    expect(fn).toHaveBeenCalledTimes(251)
  })

  it("should stop on the first error", async () => {
    const fn = vi.fn<() => Promise<string | undefined>>().mockRejectedValue(new Error("rpc down"))

    await expect(pollUntil(fn, { intervalMs: 2_000, timeoutMs: 10_000 })).rejects.toThrow("rpc down")
    expect(fn).toHaveBeenCalledTimes(1)
  })
})
