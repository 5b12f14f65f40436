/**
 * Example submitting a small task graph to the control plane
 *
 * Reads TASKLANE_ENDPOINT (and optionally TASKLANE_CLIENT_CERT,
 * TASKLANE_CLIENT_KEY, TASKLANE_PARTITION) from the environment.
 *
 * - Two independent tasks
 * - A third task that waits for both
 * - Results fetched once everything completed
 */

import { connect, SubmissionError } from "../src/index.js"

async function main() {
  const summary = await connect(async (service) => {
    console.log(`=== Session ${service} ===\n`)

    // Example 1: independent tasks in one batch
    console.log("1. Submitting two tasks...")
    const [left, right] = await service.submitTasks([
      Buffer.from("left"),
      Buffer.from("right"),
    ])
    console.log(`   Task ids: ${left}, ${right}`)

    // Example 2: a task depending on both
    console.log("2. Submitting a dependent task...")
    const merge = await service.submitTaskWithDependencies(
      Buffer.from("merge"),
      [left, right],
      3,
      { priority: 2 },
    )
    console.log(`   Task id: ${merge}`)

    // Example 3: statuses, then results
    console.log("3. Waiting for results...")
    for (const [taskId, status] of await service.getTaskStatuses([
      left,
      right,
      merge,
    ])) {
      console.log(`   ${taskId}: ${status}`)
    }
    const results = await service.getResults([left, right, merge])

    return [...results].map(
      ([taskId, output]) => `${taskId} -> ${output.length} byte(s)`,
    )
  })

  console.log(summary.join("\n"))
  console.log("\n=== Done ===")
}

main().catch((e: unknown) => {
  if (e instanceof SubmissionError) {
    console.error(
      `submission failed at payload ${e.payloadIndex} after ${e.attempts} attempt(s)`,
    )
  }
  console.error(e)
  process.exitCode = 1
})
