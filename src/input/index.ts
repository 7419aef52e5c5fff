export { readInput, parseRange } from './diffReader.js';
export type { ResolvedInput, DiffInputMode } from './diffReader.js';
export { scanFiles, fileContentToFileChange } from './fileScanner.js';
export type { ScanOptions } from './fileScanner.js';
export { collectChangeSet, widenSuggestions } from './collector.js';
