export * from './constants.js';
export * from './date.js';
export * from './money.js';
export * from './period.js';
