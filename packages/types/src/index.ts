// Domain types (records, statements, payout reports)
export * from './types/index.js';

// Zod config schemas + AJV output schema registry
export * from './schemas/index.js';

// Pure utils (money, dates, periods, constants)
export * from './utils/index.js';

export * from './errors.js';
export * from './logger.js';
export * from './config.js';
