/**
 * Tests for task option defaults, overrides and wire conversion
 */

import assert from "assert"

import {
  defaultTaskOptions,
  EngineType,
  mergeTaskOptions,
  toTaskOptionsMessage,
} from "./task_options.js"

describe("defaultTaskOptions", function () {
  it("should allow 40 seconds, 2 retries and priority 1", function () {
    const options = defaultTaskOptions()

    assert.strictEqual(options.maxDuration, 40_000)
    assert.strictEqual(options.maxRetries, 2)
    assert.strictEqual(options.priority, 1)
    assert.strictEqual(options.engineType, EngineType.Unified)
    assert.strictEqual(options.partitionId, "")
  })

  it("should return a fresh object each time", function () {
    const first = defaultTaskOptions()
    first.options["k"] = "v"

    assert.deepStrictEqual(defaultTaskOptions().options, {})
  })
})

describe("mergeTaskOptions", function () {
  it("should override only the given fields", function () {
    const base = defaultTaskOptions()
    const merged = mergeTaskOptions(base, { priority: 5, partitionId: "gpu" })

    assert.strictEqual(merged.priority, 5)
    assert.strictEqual(merged.partitionId, "gpu")
    assert.strictEqual(merged.maxRetries, 2)
    assert.strictEqual(base.priority, 1)
    assert.strictEqual(base.partitionId, "")
  })

  it("should ignore fields explicitly set to undefined", function () {
    const merged = mergeTaskOptions(defaultTaskOptions(), {
      maxDuration: undefined,
    })

    assert.strictEqual(merged.maxDuration, 40_000)
  })

  it("should replace free-form options as a whole", function () {
    const base = mergeTaskOptions(defaultTaskOptions(), {
      options: { region: "eu", tier: "standard" },
    })
    const merged = mergeTaskOptions(base, { options: { tier: "premium" } })

    assert.deepStrictEqual(merged.options, { tier: "premium" })
    assert.deepStrictEqual(base.options, { region: "eu", tier: "standard" })
  })

  it("should drop every free-form option when given an empty map", function () {
    const base = mergeTaskOptions(defaultTaskOptions(), {
      options: { region: "eu" },
    })

    assert.deepStrictEqual(mergeTaskOptions(base, { options: {} }).options, {})
    assert.deepStrictEqual(mergeTaskOptions(base, {}).options, {
      region: "eu",
    })
  })
})

describe("toTaskOptionsMessage", function () {
  it("should convert every field to its wire name", function () {
    const message = toTaskOptionsMessage(
      mergeTaskOptions(defaultTaskOptions(), {
        partitionId: "gpu",
        options: { region: "eu" },
      }),
    )

    assert.deepStrictEqual(message, {
      max_duration: { seconds: 40, nanos: 0 },
      max_retries: 2,
      priority: 1,
      partition_id: "gpu",
      application_name: "Tasklane.Worker.Unified",
      application_version: "1.X.X",
      application_namespace: "Tasklane.Worker.Unified",
      application_service: "FallBackServerAdder",
      engine_type: "Unified",
      options: { region: "eu" },
    })
  })

  it("should split sub-second durations into nanos", function () {
    const message = toTaskOptionsMessage(
      mergeTaskOptions(defaultTaskOptions(), { maxDuration: 1_500 }),
    )

    assert.deepStrictEqual(message.max_duration, {
      seconds: 1,
      nanos: 500_000_000,
    })
  })
})
