// Zod schemas and inferred record types
export * from './schemas/index.js';

// Pure utils (money tokens, dates, constants)
export * from './utils/index.js';
