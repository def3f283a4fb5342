export { SendGate } from './SendGate.js';
