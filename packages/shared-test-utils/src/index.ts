/**
 * @devquery/test-utils
 *
 * Shared test utilities for the devquery monorepo
 */

// Matchers
export { deviceMatchers, setupDeviceMatchers } from './matchers/index.js';

// Mocks
export {
  createFakeNative,
  createMemoryEnvironment,
  type FakeNative,
  type FakeNativeOptions,
  type MemoryEnvironment,
} from './mocks/index.js';

// Fixtures
export { DeviceFixtures, rawDevice } from './fixtures/index.js';

// Helpers
export { withProcessEnv } from './helpers/index.js';
