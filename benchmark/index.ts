#!/usr/bin/env tsx
/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   tsx benchmark/index.ts           # Run all benchmarks
 *   tsx benchmark/index.ts --category query
 *   tsx benchmark/index.ts --filter visibility
 *   tsx benchmark/index.ts --json
 */

import { Logger } from '@devquery/core'
import { printHeader, printSuite, printSummary } from './lib/reporter.js'
import { runSuites } from './lib/runner.js'
import { CATEGORIES, isCategory, type BenchmarkSuite, type RunOptions } from './lib/types.js'
import { suite as querySuite } from './query/query.bench.js'
import { suite as visibilitySuite } from './visibility/visibility.bench.js'

const SUITES: readonly BenchmarkSuite[] = [querySuite, visibilitySuite]

function positiveInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value)
  if (value === undefined || !Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} expects a positive integer, got ${String(value)}`)
  }
  return parsed
}

/**
 * Parse command line arguments
 *
 * @returns `null` when help was printed
 */
function parseArgs(args: readonly string[]): RunOptions | null {
  const options: RunOptions = { time: 1000, json: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const next = args[i + 1]

    switch (arg) {
      case '--category':
        if (next === undefined || !isCategory(next)) {
          throw new Error(`--category expects one of ${CATEGORIES.join(', ')}, got ${String(next)}`)
        }
        options.category = next
        i++
        break
      case '--filter':
        if (next === undefined) {
          throw new Error('--filter expects a pattern')
        }
        options.filter = next
        i++
        break
      case '--time':
        options.time = positiveInteger(arg, next)
        i++
        break
      case '--iterations':
        options.iterations = positiveInteger(arg, next)
        i++
        break
      case '--json':
        options.json = true
        break
      case '--help':
      case '-h':
        printHelp()
        return null
      default:
        throw new Error(`Unknown option ${arg}`)
    }
  }

  return options
}

function printHelp(): void {
  console.log(`
devquery benchmarks

Usage:
  tsx benchmark/index.ts [options]

Options:
  --category <name>   Only run one category (${CATEGORIES.join(', ')})
  --filter <pattern>  Only run suites or cases whose name contains the pattern
  --json              Print results as JSON
  --time <ms>         Time per case in ms (default: 1000)
  --iterations <n>    Minimum iterations per case
  --help, -h          Show this help message
`)
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2))
  if (options === null) return

  if (options.json) {
    const results = await runSuites(SUITES, options)
    console.log(JSON.stringify(results, null, 2))
    return
  }

  printHeader(process.version)
  const results = await runSuites(SUITES, options, printSuite)
  printSummary(results)
}

main().catch((err: unknown) => {
  Logger.error('Benchmark failed:', err)
  process.exitCode = 1
})
