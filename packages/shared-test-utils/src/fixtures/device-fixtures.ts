import type { RawDeviceDescriptor } from '@devquery/core';

/**
 * Hardware defaults shared by every fixture device
 */
const BASE_HARDWARE = {
  major: 8,
  minor: 6,
  totalMemory: 16 * 1024 ** 3,
  smsCount: 40,
  smThreads: 1536,
  smSharedMemory: 100 * 1024,
  smRegisters: 65536,
  smBlocks: 16,
  blockThreads: 1024,
  blockSharedMemory: 48 * 1024,
  blockRegisters: 65536,
  warpSize: 32,
  l2CacheSize: 4 * 1024 ** 2,
  concurrentKernels: true,
  asyncEnginesCount: 2,
  cooperative: true,
};

/**
 * Build a raw descriptor as the native module would return it
 *
 * `ord` is assigned by the fake native module from the device's position,
 * so the value given here is only a placeholder.
 */
export function rawDevice(
  provider: string,
  index: number,
  overrides: Partial<RawDeviceDescriptor> = {}
): RawDeviceDescriptor {
  return {
    ...BASE_HARDWARE,
    ord: 0,
    provider,
    index,
    name: `Test ${provider} GPU ${index}`,
    ...overrides,
  };
}

/**
 * Machines used across the test suites, devices in system order
 */
export const DeviceFixtures = {
  /** Two CUDA devices followed by one HIP device */
  mixed: (): RawDeviceDescriptor[] => [
    rawDevice('CUDA', 0),
    rawDevice('CUDA', 1, { major: 9, minor: 0, totalMemory: 80 * 1024 ** 3 }),
    rawDevice('HIP', 0, { warpSize: 64, major: 9, minor: 4 }),
  ],

  /** Three identical CUDA devices */
  cudaOnly: (): RawDeviceDescriptor[] => [rawDevice('CUDA', 0), rawDevice('CUDA', 1), rawDevice('CUDA', 2)],

  /** Two HIP devices */
  hipOnly: (): RawDeviceDescriptor[] => [
    rawDevice('HIP', 0, { warpSize: 64 }),
    rawDevice('HIP', 1, { warpSize: 64 }),
  ],

  /** No devices at all */
  empty: (): RawDeviceDescriptor[] => [],
};
