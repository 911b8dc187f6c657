export { createCable, deleteCable } from './apply.js';
