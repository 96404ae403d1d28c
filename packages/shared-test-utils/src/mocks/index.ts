/**
 * Mock implementations for testing
 */

export { createFakeNative, type FakeNative, type FakeNativeOptions } from './native-mock.js';
export { createMemoryEnvironment, type MemoryEnvironment } from './visibility-port.js';
