export { createVlan, updateVlan, defaultVlanName } from './apply.js';
