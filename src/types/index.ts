export type * from './script.js';
export type * from './execution.js';
export type * from './match.js';
export { TERMINAL_STATUSES } from './execution.js';
