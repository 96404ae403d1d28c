/**
 * Benchmark suite and result types
 *
 * A suite names the mock machines it needs and the cases to time. The runner
 * builds one MockBackend per machine, so results carry the device mix each
 * case ran against.
 */

import type { Backend, MockBackendOptions, ProviderName } from '@devquery/core'

export const CATEGORIES = ['query', 'visibility'] as const

export type Category = (typeof CATEGORIES)[number]

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value)
}

/**
 * Mock machine shared by the cases of a suite
 */
export interface Machine {
  name: string
  options: MockBackendOptions
}

/**
 * One timed operation. `machine` cases receive the backend built for the
 * named machine; `pure` cases exercise helpers that need no backend.
 */
export type BenchCase =
  | { kind: 'machine'; name: string; machine: string; fn: (backend: Backend) => unknown }
  | { kind: 'pure'; name: string; fn: () => unknown }

export interface BenchmarkSuite {
  name: string
  category: Category
  machines: readonly Machine[]
  cases: readonly BenchCase[]
}

export interface RunOptions {
  /** Time in ms per case */
  time: number
  /** Minimum iterations per case */
  iterations?: number
  category?: Category
  /** Case-insensitive match on suite or case names */
  filter?: string
  /** Print results as JSON instead of a table */
  json: boolean
}

export interface ProviderMix {
  provider: ProviderName
  total: number
  visible: number
}

export interface MachineSummary {
  name: string
  total: number
  visible: number
  providers: ProviderMix[]
}

export interface CaseResult {
  name: string
  /** Machine the case ran against, `null` for pure cases */
  machine: string | null
  opsPerSec: number
  /** Mean time per call in microseconds */
  meanUs: number
  /** Relative margin of error (percentage) */
  rme: number
  /** Mean time divided by the machine's device count */
  perDeviceUs: number | null
}

export interface SuiteResult {
  name: string
  category: Category
  machines: MachineSummary[]
  cases: CaseResult[]
  /** Wall time in ms */
  duration: number
}

export interface BenchmarkResults {
  timestamp: string
  node: string
  suites: SuiteResult[]
}
