/**
 * FAULT CORPUS MODULE — Index
 */

export * from './corpus.types.js';
export { loadCorpus, readDatasetFile } from './corpus.loader.js';
