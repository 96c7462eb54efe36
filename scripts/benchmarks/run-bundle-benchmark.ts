import { BundleWaypointSolver } from "../../lib/BundleWaypointSolver"
import { countRouteIntersections } from "../../lib/countRouteIntersections"
import { generateRandomBundleProblem } from "../../lib/problem-generator"
import { createRng } from "../../lib/problem-generator/createRng"

const NUM_PROBLEMS = 200
const MIN_PORT_PAIRS = 1
const MAX_PORT_PAIRS = 64
const BENCHMARK_SEED = 42

interface ProblemResult {
  problemIndex: number
  numPortPairs: number
  solveTimeMs: number
  failed: boolean
  intersectionCount: number
}

function runBenchmark() {
  const random = createRng(BENCHMARK_SEED)
  const results: ProblemResult[] = []
  const startTime = performance.now()

  console.log("=".repeat(60))
  console.log("BUNDLE WAYPOINT SOLVER BENCHMARK")
  console.log("=".repeat(60))
  console.log(`Running benchmark with ${NUM_PROBLEMS} problems...`)
  console.log(`Port pairs range: ${MIN_PORT_PAIRS} to ${MAX_PORT_PAIRS}\n`)

  for (let i = 0; i < NUM_PROBLEMS; i++) {
    const numPortPairs =
      MIN_PORT_PAIRS +
      Math.floor(random() * (MAX_PORT_PAIRS - MIN_PORT_PAIRS + 1))

    const problem = generateRandomBundleProblem({
      randomSeed: i,
      numPortPairs,
      shuffle: i % 2 === 1,
    })

    const solver = new BundleWaypointSolver(problem)
    const problemStart = performance.now()

    solver.solve()

    const solveTimeMs = performance.now() - problemStart

    results.push({
      problemIndex: i,
      numPortPairs,
      solveTimeMs,
      failed: solver.failed,
      intersectionCount: countRouteIntersections(solver.routes),
    })

    process.stdout.write(
      `\r  Progress: ${i + 1}/${NUM_PROBLEMS} problems completed`,
    )
  }
  console.log()

  const totalTimeMs = performance.now() - startTime

  const times = results.map((r) => r.solveTimeMs)
  const sortedTimes = [...times].sort((a, b) => a - b)
  const avgTimeMs = times.reduce((a, b) => a + b, 0) / times.length
  const p95TimeMs = sortedTimes[Math.ceil(times.length * 0.95) - 1]
  const medianTimeMs = sortedTimes[Math.floor(times.length / 2)]
  const maxTimeMs = sortedTimes[sortedTimes.length - 1]

  const failedCount = results.filter((r) => r.failed).length
  const problemsWithIntersections = results.filter(
    (r) => r.intersectionCount > 0,
  ).length

  console.log("\n" + "=".repeat(60))
  console.log("OVERALL RESULTS")
  console.log("=".repeat(60))
  console.log(`Total problems:        ${NUM_PROBLEMS}`)
  console.log(`Total time:            ${(totalTimeMs / 1000).toFixed(2)}s`)
  console.log(`Failed:                ${failedCount}`)
  console.log(`With intersections:    ${problemsWithIntersections}`)

  console.log("\n" + "-".repeat(60))
  console.log("TIMING STATISTICS (ms)")
  console.log("-".repeat(60))
  console.log(`Average:               ${avgTimeMs.toFixed(3)}`)
  console.log(`Median:                ${medianTimeMs.toFixed(3)}`)
  console.log(`P95 (slowest):         ${p95TimeMs.toFixed(3)}`)
  console.log(`Max (slowest):         ${maxTimeMs.toFixed(3)}`)
  console.log("=".repeat(60))

  console.log(
    "\n[SUMMARY] BundleWaypointSolver: " +
      `avg_time=${avgTimeMs.toFixed(3)}ms, ` +
      `failed=${failedCount}, ` +
      `intersections=${problemsWithIntersections}`,
  )
}

runBenchmark()
