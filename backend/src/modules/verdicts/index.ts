/**
 * VERDICTS MODULE — Index
 */

// Contracts
export * from './contracts/verdict.types.js';

// Storage
export type { VerdictStore } from './storage/verdict.store.port.js';
export { MongoVerdictStore, ensureVerdictIndexes } from './storage/verdict.mongo.js';
export { InMemoryVerdictStore } from './storage/verdict.memory.js';
export { openVerdictStore } from './storage/verdict.store.factory.js';
export type { OpenedVerdictStore } from './storage/verdict.store.factory.js';

// Services
export { VerdictQueryService } from './services/verdict.query.service.js';
export type { VerdictSnapshot, VerdictQueryOptions } from './services/verdict.query.service.js';
