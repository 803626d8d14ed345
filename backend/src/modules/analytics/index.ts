/**
 * ANALYTICS MODULE — Index
 */

export * from './analytics.types.js';
export * from './analytics.service.js';
