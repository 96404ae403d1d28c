/**
 * Query Engine Benchmarks
 *
 * Enumeration cost against mock machines of increasing size. Every call
 * re-reads the backend, so these measure the full engine path: requirement
 * checks, visibility clearing and restoring, per-device mapping.
 */

import { Provider, count, get, query } from '@devquery/core'
import type { BenchmarkSuite } from '../lib/types.js'

export const suite: BenchmarkSuite = {
  name: 'Query Engine',
  category: 'query',

  machines: [
    { name: 'small', options: { cudaCount: 2, hipCount: null } },
    {
      // Every other CUDA device hidden; HIP inherits the same list
      name: 'large',
      options: { cudaCount: 64, hipCount: 64, cudaVisible: Array.from({ length: 32 }, (_, i) => i * 2) },
    },
  ],

  cases: [
    // Unfiltered counts go straight to the backend
    { kind: 'machine', name: 'count()', machine: 'small', fn: (backend) => count(undefined, { backend }) },
    {
      kind: 'machine',
      name: 'count(visibleOnly)',
      machine: 'large',
      fn: (backend) => count(undefined, { backend, visibleOnly: true }),
    },

    // Full enumeration
    { kind: 'machine', name: 'query() small', machine: 'small', fn: (backend) => query(undefined, { backend }) },
    { kind: 'machine', name: 'query() large', machine: 'large', fn: (backend) => query(undefined, { backend }) },
    {
      kind: 'machine',
      name: 'query(visibleOnly: false)',
      machine: 'large',
      fn: (backend) => query(undefined, { backend, visibleOnly: false }),
    },

    // Filtering and requirements
    {
      kind: 'machine',
      name: 'query(HIP, required: ALL)',
      machine: 'large',
      fn: (backend) => query(Provider.HIP, { backend, required: Provider.ALL }),
    },
    { kind: 'machine', name: 'count(CUDA)', machine: 'large', fn: (backend) => count(Provider.CUDA, { backend }) },

    // Single device lookups
    { kind: 'machine', name: 'get(idx) by ordinal', machine: 'large', fn: (backend) => get(100, undefined, { backend }) },
    {
      kind: 'machine',
      name: 'get(idx, HIP)',
      machine: 'large',
      fn: (backend) => get(10, Provider.HIP, { backend }),
    },
  ],
}
