export { createIpAddress, deleteIpAddress } from './apply.js';
