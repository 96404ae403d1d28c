import { expect } from 'vitest';
import type { DeviceProperties } from '@devquery/core';

/**
 * Custom Vitest matchers for device assertions
 */

declare module 'vitest' {
  interface Assertion<T> {
    /**
     * Assert that a device is visible to the current process
     */
    toBeVisibleDevice(): T;

    /**
     * Assert that a device comes from the named provider ('CUDA' or 'HIP')
     */
    toHaveProvider(expected: string): T;

    /**
     * Assert a device's system-wide and local indices
     */
    toHaveIndices(systemIndex: number, index: number | null): T;
  }

  interface AsymmetricMatchersContaining {
    toBeVisibleDevice(): unknown;
    toHaveProvider(expected: string): unknown;
    toHaveIndices(systemIndex: number, index: number | null): unknown;
  }
}

export const deviceMatchers = {
  toBeVisibleDevice(received: DeviceProperties) {
    const pass = received.index !== null;

    return {
      pass,
      message: () =>
        pass
          ? `Expected ${received.label} to be hidden, but it is visible`
          : `Expected ${received.label} to be visible, but it is hidden`,
      actual: received.index,
    };
  },

  toHaveProvider(received: DeviceProperties, expected: string) {
    const actual = received.provider.name;
    const pass = actual === expected;

    return {
      pass,
      message: () =>
        pass
          ? `Expected device not to have provider "${expected}", but it does`
          : `Expected device to have provider "${expected}", but got "${actual}"`,
      actual,
      expected,
    };
  },

  toHaveIndices(received: DeviceProperties, systemIndex: number, index: number | null) {
    const pass = received.systemIndex === systemIndex && received.index === index;

    return {
      pass,
      message: () =>
        pass
          ? `Expected device not to have indices ${systemIndex} -> ${index}, but it does`
          : `Expected device to have indices ${systemIndex} -> ${index}, but got ${received.systemIndex} -> ${received.index}`,
      actual: [received.systemIndex, received.index],
      expected: [systemIndex, index],
    };
  },
};

/**
 * Setup device matchers for Vitest
 * Call this in your test setup file or at the beginning of test suites
 */
export function setupDeviceMatchers(): void {
  expect.extend(deviceMatchers);
}
