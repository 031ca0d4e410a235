/**
 * Tree synthesizer exports barrel file.
 */
export { TreeSynthesizer } from './engine.js';
export type { SynthesisPlan } from './engine.js';
export type { PlannedEntry, SynthesisResult, SynthesizeOptions } from './types.js';
