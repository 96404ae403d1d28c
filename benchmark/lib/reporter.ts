/**
 * Console output for benchmark results
 */

import type { BenchmarkResults, CaseResult, MachineSummary, SuiteResult } from './types.js'
import { formatOps, formatTime, pad } from './utils.js'

/** `2 devices, 1 visible (CUDA 1/2, HIP 0/0)` */
export function formatMachine(machine: MachineSummary): string {
  const mix = machine.providers
    .filter((entry) => entry.total > 0)
    .map((entry) => `${entry.provider} ${entry.visible}/${entry.total}`)
  const detail = mix.length > 0 ? ` (${mix.join(', ')})` : ''
  return `${machine.total} devices, ${machine.visible} visible${detail}`
}

export function formatCase(result: CaseResult): string {
  const name = pad(result.name, 36)
  const ops = pad(`${formatOps(result.opsPerSec)} ops/sec`, 16, 'right')
  const time = pad(formatTime(result.meanUs), 10, 'right')
  const rme = pad(`±${result.rme.toFixed(1)}%`, 7, 'right')
  const perDevice = result.perDeviceUs === null ? '' : ` │ ${formatTime(result.perDeviceUs)}/device`
  return `  ${name} │ ${ops} │ ${time} │ ${rme}${perDevice}`
}

export function printHeader(node: string): void {
  console.log('')
  console.log(`devquery benchmarks (node ${node})`)
  console.log('')
}

export function printSuite(result: SuiteResult): void {
  console.log(`[${result.category}] ${result.name}`)
  for (const machine of result.machines) {
    console.log(`  machine ${pad(machine.name, 8)} ${formatMachine(machine)}`)
  }
  for (const entry of result.cases) {
    console.log(formatCase(entry))
  }
  console.log('')
}

/**
 * Totals, plus the case with the highest cost per enumerated device
 */
export function printSummary(results: BenchmarkResults): void {
  const cases = results.suites.flatMap((suite) => suite.cases)
  if (cases.length === 0) {
    console.log('No benchmarks were run.')
    return
  }

  const duration = results.suites.reduce((total, suite) => total + suite.duration, 0)
  console.log(`${cases.length} cases in ${(duration / 1000).toFixed(1)}s`)

  let costliest: CaseResult | null = null
  for (const entry of cases) {
    if (entry.perDeviceUs !== null && (costliest?.perDeviceUs ?? -1) < entry.perDeviceUs) {
      costliest = entry
    }
  }
  if (costliest !== null && costliest.perDeviceUs !== null) {
    console.log(`Highest per-device cost: ${costliest.name} @ ${formatTime(costliest.perDeviceUs)}/device`)
  }
  console.log('')
}
