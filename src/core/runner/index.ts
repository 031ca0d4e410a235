/**
 * Run pipeline exports barrel file.
 */
export { AdeRunner } from './runner.js';
export type {
  CreateOutcome,
  CreateRequest,
  ParseOutcome,
  RunOutcome,
  RunSettings,
  RunStage,
} from './types.js';
