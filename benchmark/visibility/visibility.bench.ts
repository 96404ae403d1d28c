/**
 * Visibility and Provider Benchmarks
 */

import { Provider, globalToLocal, parseVisibleDevices, resolveVisibility } from '@devquery/core'
import type { BenchmarkSuite } from '../lib/types.js'
import { indexList } from '../lib/utils.js'

const short = indexList(4)
const long = indexList(256, 3)
const visible = parseVisibleDevices(long, 'CUDA')

export const suite: BenchmarkSuite = {
  name: 'Visibility Resolution',
  category: 'visibility',

  machines: [{ name: 'masked', options: { cudaCount: 8, hipCount: 8, cudaVisible: [1, 3], hipVisible: [0] } }],

  cases: [
    { kind: 'pure', name: 'parseVisibleDevices 4 entries', fn: () => parseVisibleDevices(short, 'CUDA') },
    { kind: 'pure', name: 'parseVisibleDevices 256 entries', fn: () => parseVisibleDevices(long, 'CUDA') },
    { kind: 'pure', name: 'resolveVisibility (HIP inherits)', fn: () => resolveVisibility({ CUDA: short }) },
    { kind: 'pure', name: 'globalToLocal hit', fn: () => globalToLocal(600, visible) },
    { kind: 'pure', name: 'globalToLocal miss', fn: () => globalToLocal(601, visible) },
    {
      kind: 'machine',
      name: 'saveVisible(clear) round trip',
      machine: 'masked',
      fn: (backend) => backend.saveVisible(true, (lists) => lists.CUDA),
    },
    { kind: 'pure', name: 'Provider.parse("cuda|hip")', fn: () => Provider.parse('cuda|hip') },
  ],
}
