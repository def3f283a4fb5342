export type { SendTask, SendObserver, Subscription } from './SendUnit.js';
export { SendUnit } from './SendUnit.js';
export type { Payload } from './payload.js';
export { mapPayload } from './payload.js';
