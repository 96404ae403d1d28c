export { deviceMatchers, setupDeviceMatchers } from './device-matchers.js';
