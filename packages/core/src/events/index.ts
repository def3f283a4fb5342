export { TypedEventEmitter } from './TypedEventEmitter.js';
