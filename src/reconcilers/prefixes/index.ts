export { createPrefix, DEFAULT_PREFIX_STATUS } from './apply.js';
