/**
 * GENERATOR MODULE — Index
 */

export * from './sample.synthesizer.js';
export * from './ingestion.appender.js';
