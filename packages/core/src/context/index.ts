export type { ExchangeConnectionHook } from './default.js';
