/**
 * Generation exports barrel file.
 */
export { GenerationEngine, safeOutputPath } from './engine.js';
export {
  buildAnswersRecord,
  serializeAnswers,
  parseAnswers,
  readAnswersFile,
  findAnswersFiles,
  DEFAULT_ANSWERS_FILE,
} from './answers.js';
export { prepareUpdate } from './update.js';
export type { UpdateOptions, PreparedUpdate } from './update.js';
export type {
  PlannedFile,
  PlanAction,
  AnswersRecord,
  PlanInput,
  GenerationPlan,
  ConflictPolicy,
  ApplyOptions,
  ApplyResult,
} from './types.js';
