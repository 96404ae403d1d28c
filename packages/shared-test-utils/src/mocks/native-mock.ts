import { vi, type Mock } from 'vitest';
import {
  globalToLocal,
  isProviderName,
  resolveVisibility,
  visibilityVariable,
  type RawDeviceDescriptor,
  type VisibilityPort,
} from '@devquery/core';
import { createMemoryEnvironment } from './visibility-port.js';

export interface FakeNativeOptions {
  /** Devices in system order (default: none) */
  devices?: RawDeviceDescriptor[];
  /** Where the fake reads `*_VISIBLE_DEVICES` from (default: an empty in-memory environment) */
  environment?: VisibilityPort;
  /** Value returned by `checkCuda` (default: 0, installed) */
  cudaStatus?: number;
  /** Value returned by `checkHip` (default: 0, installed) */
  hipStatus?: number;
}

/**
 * Native module whose exports are all spies
 */
export interface FakeNative {
  count: Mock<() => number>;
  get: Mock<(ord: number) => RawDeviceDescriptor>;
  checkCuda: Mock<() => number>;
  checkHip: Mock<() => number>;
  setLocationHints: Mock<(hints: string[]) => void>;
  /** Devices the fake was built with, in system order */
  readonly devices: readonly RawDeviceDescriptor[];
}

/**
 * Create a fake native module
 *
 * Like the real runtimes, it only reports the devices allowed by
 * `*_VISIBLE_DEVICES` at call time, renumbering ordinals and indices.
 */
export function createFakeNative(options: FakeNativeOptions = {}): FakeNative {
  const devices = options.devices ?? [];
  const environment = options.environment ?? createMemoryEnvironment();

  const reported = (): RawDeviceDescriptor[] => {
    const visible = resolveVisibility({
      CUDA: environment.read(visibilityVariable('CUDA')),
      HIP: environment.read(visibilityVariable('HIP')),
    });
    const result: RawDeviceDescriptor[] = [];
    for (const device of devices) {
      const list = isProviderName(device.provider) ? visible[device.provider] : null;
      const local = globalToLocal(device.index, list);
      if (local !== null) {
        result.push({ ...device, ord: result.length, index: local });
      }
    }
    return result;
  };

  return {
    devices,
    count: vi.fn(() => reported().length),
    get: vi.fn((ord: number) => {
      const device = reported()[ord];
      if (device === undefined) {
        throw new RangeError(`no device at ordinal ${ord}`);
      }
      return device;
    }),
    checkCuda: vi.fn(() => options.cudaStatus ?? 0),
    checkHip: vi.fn(() => options.hipStatus ?? 0),
    setLocationHints: vi.fn<(hints: string[]) => void>(),
  };
}
