/**
 * Benchmark utility functions
 */

import { Bench } from 'tinybench'
import type { RunOptions } from './types.js'

/**
 * Format time value for display
 * @param us - Time in microseconds
 */
export function formatTime(us: number): string {
  if (us < 1) {
    return `${(us * 1000).toFixed(1)}ns`
  }
  if (us < 1000) {
    return `${us.toFixed(1)}μs`
  }
  if (us < 1000000) {
    return `${(us / 1000).toFixed(2)}ms`
  }
  return `${(us / 1000000).toFixed(2)}s`
}

/**
 * Format ops/sec for display
 * @param ops - Operations per second
 */
export function formatOps(ops: number): string {
  if (ops >= 1000000) {
    return `${(ops / 1000000).toFixed(2)}M`
  }
  if (ops >= 1000) {
    return `${(ops / 1000).toFixed(2)}K`
  }
  return ops.toFixed(0)
}

/**
 * Pad string to width
 */
export function pad(str: string, width: number, align: 'left' | 'right' = 'left'): string {
  if (str.length >= width) return str
  const padding = ' '.repeat(width - str.length)
  return align === 'left' ? str + padding : padding + str
}

/**
 * Create a tinybench instance from the run options
 */
export function createBench(options: RunOptions): Bench {
  const { time, iterations } = options
  return iterations === undefined ? new Bench({ time }) : new Bench({ time, iterations })
}

/**
 * Comma-separated index list, as found in `*_VISIBLE_DEVICES`
 */
export function indexList(length: number, step = 1): string {
  return Array.from({ length }, (_, i) => String(i * step)).join(',')
}
