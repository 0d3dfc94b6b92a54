import type { Clock } from './types.js';

/** Wall clock in whole epoch seconds */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);
