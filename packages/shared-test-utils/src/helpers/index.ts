export { withProcessEnv } from './env-helper.js';
