/**
 * Tree parser exports barrel file.
 */
export { TreeParser } from './engine.js';
export type { ParseMatch, ParseOptions } from './engine.js';
