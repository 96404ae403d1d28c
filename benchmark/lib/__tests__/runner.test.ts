import { describe, it, expect } from 'vitest'
import { MockBackend, count } from '@devquery/core'
import { formatCase, formatMachine } from '../reporter.js'
import { describeMachine, runSuite, selectSuites } from '../runner.js'
import type { BenchmarkSuite, RunOptions } from '../types.js'

const options: RunOptions = { time: 1, iterations: 2, json: false }

const suites: BenchmarkSuite[] = [
  {
    name: 'Query Engine',
    category: 'query',
    machines: [{ name: 'small', options: { cudaCount: 2 } }],
    cases: [
      { kind: 'machine', name: 'count()', machine: 'small', fn: (backend) => count(undefined, { backend }) },
      { kind: 'pure', name: 'noop', fn: () => 0 },
    ],
  },
  {
    name: 'Visibility Resolution',
    category: 'visibility',
    machines: [],
    cases: [{ kind: 'pure', name: 'parse', fn: () => 0 }],
  },
]

describe('describeMachine', () => {
  it('reports totals and the visible share per provider', () => {
    const backend = new MockBackend({ cudaCount: 2, hipCount: 3, cudaVisible: [1] })
    expect(describeMachine('mixed', backend)).toEqual({
      name: 'mixed',
      total: 5,
      visible: 2,
      providers: [
        { provider: 'CUDA', total: 2, visible: 1 },
        { provider: 'HIP', total: 3, visible: 1 },
      ],
    })
  })

  it('formats only the providers that have devices', () => {
    const summary = describeMachine('cuda', new MockBackend({ cudaCount: 4, cudaVisible: [0, 2] }))
    expect(formatMachine(summary)).toBe('4 devices, 2 visible (CUDA 2/4)')
  })
})

describe('selectSuites', () => {
  it('filters by category', () => {
    const selected = selectSuites(suites, { ...options, category: 'visibility' })
    expect(selected.map((suite) => suite.name)).toEqual(['Visibility Resolution'])
  })

  it('keeps every case of a suite whose name matches', () => {
    const selected = selectSuites(suites, { ...options, filter: 'QUERY' })
    expect(selected).toHaveLength(1)
    expect(selected[0].cases).toHaveLength(2)
  })

  it('narrows to matching cases otherwise and drops empty suites', () => {
    const selected = selectSuites(suites, { ...options, filter: 'count' })
    expect(selected).toHaveLength(1)
    expect(selected[0].cases.map((entry) => entry.name)).toEqual(['count()'])
  })
})

describe('runSuite', () => {
  it('times each case and relates machine cases to device counts', async () => {
    const result = await runSuite(suites[0], options)
    expect(result.machines).toEqual([
      {
        name: 'small',
        total: 2,
        visible: 2,
        providers: [
          { provider: 'CUDA', total: 2, visible: 2 },
          { provider: 'HIP', total: 0, visible: 0 },
        ],
      },
    ])
    expect(result.cases.map((entry) => [entry.name, entry.machine])).toEqual([
      ['count()', 'small'],
      ['noop', null],
    ])
    const [machineCase, pureCase] = result.cases
    expect(machineCase.perDeviceUs).toBeCloseTo(machineCase.meanUs / 2)
    expect(pureCase.perDeviceUs).toBeNull()
  })

  it('rejects cases that name an unknown machine', async () => {
    const broken: BenchmarkSuite = {
      name: 'Broken',
      category: 'query',
      machines: [],
      cases: [{ kind: 'machine', name: 'count()', machine: 'missing', fn: () => 0 }],
    }
    await expect(runSuite(broken, options)).rejects.toThrow('Broken: case "count()" uses unknown machine "missing"')
  })
})

describe('formatCase', () => {
  it('appends the per-device cost for machine cases', () => {
    const line = formatCase({
      name: 'query() large',
      machine: 'large',
      opsPerSec: 1234,
      meanUs: 810.4,
      rme: 1.5,
      perDeviceUs: 6.5,
    })
    expect(line).toBe(
      '  query() large' + ' '.repeat(23) + ' │ ' + '   1.23K ops/sec' + ' │ ' + '   810.4μs' + ' │ ' + '  ±1.5%' +
        ' │ 6.5μs/device',
    )
  })

  it('omits it for pure cases', () => {
    const line = formatCase({ name: 'parse', machine: null, opsPerSec: 10, meanUs: 2, rme: 0.5, perDeviceUs: null })
    expect(line.endsWith('│      2.0μs │   ±0.5%')).toBe(true)
  })
})
