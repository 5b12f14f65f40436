/**
 * Tests for bounded retries with exponential backoff
 */

import assert from "assert"
import * as grpc from "@grpc/grpc-js"

import { serviceError } from "../api/test/fake_control_plane.js"
import { calculateBackoff, withRetries } from "./retry.js"

/**
 * Operation failing `failures` times with UNAVAILABLE, then returning "ok"
 */
function flaky(failures: number) {
  let calls = 0
  const fn = async (): Promise<string> => {
    calls++
    if (calls <= failures) {
      throw serviceError(grpc.status.UNAVAILABLE, `failure ${calls}`)
    }
    return "ok"
  }
  return { fn, calls: () => calls }
}

describe("calculateBackoff", function () {
  it("should grow exponentially with up to 100% jitter", function () {
    for (let attempt = 0; attempt < 4; attempt++) {
      const delay = calculateBackoff(attempt, 10, 10_000)
      const base = 10 * 2 ** attempt
      assert.ok(delay >= base, `delay ${delay} below ${base}`)
      assert.ok(delay <= 2 * base, `delay ${delay} above ${2 * base}`)
    }
  })

  it("should never exceed the cap", function () {
    assert.strictEqual(calculateBackoff(20, 100, 5_000), 5_000)
  })

  it("should be zero without a base delay", function () {
    assert.strictEqual(calculateBackoff(3, 0, 5_000), 0)
  })
})

describe("withRetries", function () {
  it("should succeed when failures do not exceed maxRetries", async function () {
    const op = flaky(3)

    const result = await withRetries(op.fn, { maxRetries: 3, backoffMs: 0 })

    assert.strictEqual(result, "ok")
    assert.strictEqual(op.calls(), 4)
  })

  it("should rethrow the last error once retries are exhausted", async function () {
    const op = flaky(3)

    await assert.rejects(withRetries(op.fn, { maxRetries: 2, backoffMs: 0 }), {
      code: grpc.status.UNAVAILABLE,
      details: "failure 3",
    })
    assert.strictEqual(op.calls(), 3)
  })

  it("should send once when maxRetries is 0", async function () {
    const op = flaky(1)

    await assert.rejects(withRetries(op.fn, { maxRetries: 0, backoffMs: 0 }))
    assert.strictEqual(op.calls(), 1)
  })

  it("should refuse a retry ceiling that is not a non-negative integer", async function () {
    for (const maxRetries of [NaN, -1, 1.5, Infinity]) {
      const op = flaky(1)

      await assert.rejects(
        withRetries(op.fn, { maxRetries, backoffMs: 0 }),
        RangeError,
      )
      assert.strictEqual(op.calls(), 0)
    }
  })

  it("should not retry errors that are not transient", async function () {
    let calls = 0

    await assert.rejects(
      withRetries(
        async () => {
          calls++
          throw serviceError(grpc.status.INVALID_ARGUMENT, "malformed request")
        },
        { maxRetries: 5, backoffMs: 0 },
      ),
      { code: grpc.status.INVALID_ARGUMENT },
    )
    assert.strictEqual(calls, 1)
  })

  it("should use a custom retry predicate", async function () {
    let calls = 0

    const result = await withRetries(
      async (attempt) => {
        calls++
        if (attempt === 0) {
          throw new Error("first attempt")
        }
        return attempt
      },
      { maxRetries: 1, backoffMs: 0, isRetryable: () => true },
    )

    assert.strictEqual(result, 1)
    assert.strictEqual(calls, 2)
  })

  it("should stop backing off when the signal aborts", async function () {
    const controller = new AbortController()
    const op = flaky(10)

    const pending = withRetries(op.fn, {
      maxRetries: 10,
      backoffMs: 1_000,
      signal: controller.signal,
    })
    setTimeout(() => controller.abort(), 5)

    await assert.rejects(pending, { name: "AbortError" })
    assert.strictEqual(op.calls(), 1)
  })
})
