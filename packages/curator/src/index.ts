export type { ErrorRates, TextComparator } from './comparators/text-comparator';
export { EditDistanceComparator } from './comparators/edit-distance-comparator';
export {
  CURATION,
  CURATION_JOB,
  JUDGE_MODEL,
  SEMANTIC_EVALUATION,
  TEXT_QUALITY,
} from './config/constants';
export { createJudgeModel } from './config/judge-model';
export type { JudgeModelOptions } from './config/judge-model';
export { BaseLLMComponent } from './core/base-llm-component';
export type { BaseLLMComponentOptions } from './core/base-llm-component';
export { TextLLMComponent } from './core/text-llm-component';
export {
  CurationError,
  CurationJobNotFoundError,
  JudgeConfigurationError,
} from './errors/curation-error';
export {
  SemanticEvaluator,
  evaluateSemantic,
  truncateDocument,
} from './evaluators/semantic-evaluator';
export type {
  EvaluateSemanticOptions,
  SemanticEvaluatorOptions,
} from './evaluators/semantic-evaluator';
export {
  StructureEvaluator,
  evaluateStructure,
} from './evaluators/structure-evaluator';
export { evaluateTextQuality } from './evaluators/text-quality-evaluator';
export { createCurationJob, getResultFilename } from './jobs/curation-job';
export { CurationJobRunner } from './jobs/curation-job-runner';
export type {
  CurationJobRunnerOptions,
  DocumentCurator,
} from './jobs/curation-job-runner';
export {
  SemanticJudgmentSchema,
  parseJudgment,
  stripCodeFence,
} from './parsers/judgment-parser';
export type {
  JudgmentParseErrorKind,
  JudgmentParseResult,
  SemanticJudgment,
} from './parsers/judgment-parser';
export { InMemoryCurationRecordStore } from './stores/in-memory-curation-record-store';
export { Curator, combineReports, curate } from './curator';
export type { CuratorOptions } from './curator';
