/**
 * Test fixtures
 */

export { DeviceFixtures, rawDevice } from './device-fixtures.js';
