/**
 * Benchmark runner
 */

import type { Task } from 'tinybench'
import { Logger, MockBackend, PROVIDER_NAMES, Provider, count, type Backend } from '@devquery/core'
import type {
  BenchCase,
  BenchmarkResults,
  BenchmarkSuite,
  CaseResult,
  MachineSummary,
  RunOptions,
  SuiteResult,
} from './types.js'
import { createBench } from './utils.js'

const log = Logger.child('[bench]')

/**
 * Device totals of a machine, overall and per provider
 */
export function describeMachine(name: string, backend: Backend): MachineSummary {
  return {
    name,
    total: count(undefined, { backend }),
    visible: count(undefined, { backend, visibleOnly: true }),
    providers: PROVIDER_NAMES.map((provider) => ({
      provider,
      total: count(Provider.of(provider), { backend }),
      visible: count(Provider.of(provider), { backend, visibleOnly: true }),
    })),
  }
}

/**
 * Apply the category and name filters
 *
 * A suite whose name matches keeps every case; otherwise only matching
 * cases stay, and suites left without cases are dropped.
 */
export function selectSuites(suites: readonly BenchmarkSuite[], options: RunOptions): BenchmarkSuite[] {
  const pattern = options.filter?.toLowerCase()
  const selected: BenchmarkSuite[] = []

  for (const suite of suites) {
    if (options.category !== undefined && suite.category !== options.category) {
      continue
    }
    if (pattern === undefined || suite.name.toLowerCase().includes(pattern)) {
      selected.push(suite)
      continue
    }
    const cases = suite.cases.filter((entry) => entry.name.toLowerCase().includes(pattern))
    if (cases.length > 0) {
      selected.push({ ...suite, cases })
    }
  }
  return selected
}

function toCaseResult(task: Task, entry: BenchCase, machines: Map<string, MachineSummary>): CaseResult | null {
  const result = task.result
  if (!result) {
    log.warn(`${task.name} produced no result`)
    return null
  }

  const meanUs = result.mean * 1000
  const machine = entry.kind === 'machine' ? machines.get(entry.machine) : undefined
  return {
    name: entry.name,
    machine: machine?.name ?? null,
    opsPerSec: Math.round(result.hz),
    meanUs,
    rme: result.rme,
    perDeviceUs: machine !== undefined && machine.total > 0 ? meanUs / machine.total : null,
  }
}

/**
 * Build the suite's machines and time every case against them
 */
export async function runSuite(suite: BenchmarkSuite, options: RunOptions): Promise<SuiteResult> {
  const started = Date.now()
  const backends = new Map<string, Backend>()
  const summaries = new Map<string, MachineSummary>()

  for (const machine of suite.machines) {
    const backend = new MockBackend(machine.options)
    backends.set(machine.name, backend)
    summaries.set(machine.name, describeMachine(machine.name, backend))
  }

  const bench = createBench(options)
  const byName = new Map<string, BenchCase>()

  for (const entry of suite.cases) {
    byName.set(entry.name, entry)
    if (entry.kind === 'pure') {
      bench.add(entry.name, entry.fn)
      continue
    }
    const backend = backends.get(entry.machine)
    if (backend === undefined) {
      throw new Error(`${suite.name}: case "${entry.name}" uses unknown machine "${entry.machine}"`)
    }
    bench.add(entry.name, () => entry.fn(backend))
  }

  log.debug(`${suite.name}: ${suite.cases.length} case(s) on ${backends.size} machine(s)`)
  await bench.run()

  const cases: CaseResult[] = []
  for (const task of bench.tasks) {
    const entry = byName.get(task.name)
    const result = entry === undefined ? null : toCaseResult(task, entry, summaries)
    if (result !== null) {
      cases.push(result)
    }
  }

  return {
    name: suite.name,
    category: suite.category,
    machines: [...summaries.values()],
    cases,
    duration: Date.now() - started,
  }
}

/**
 * Run the selected suites in order
 *
 * @param onSuite - Called as each suite finishes
 */
export async function runSuites(
  suites: readonly BenchmarkSuite[],
  options: RunOptions,
  onSuite: (result: SuiteResult) => void = () => {},
): Promise<BenchmarkResults> {
  const results: BenchmarkResults = {
    timestamp: new Date().toISOString(),
    node: process.version,
    suites: [],
  }

  for (const suite of selectSuites(suites, options)) {
    const result = await runSuite(suite, options)
    results.suites.push(result)
    onSuite(result)
  }
  return results
}
