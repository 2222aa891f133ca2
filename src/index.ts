export { extractReturnRecords } from './services/returns';
export type { ExtractOptions } from './services/returns';
export {
  DEFAULT_RETURN_SLIP_GRAMMAR,
  createGrammar,
  classifyLine,
  mergeWrappedLines,
  toRawLines,
  segmentLine,
  splitNames,
  extractTabletCodes,
  validateRecord,
  dedupeBySlipId,
  scoreRecord,
  sortByPriority,
  UNKNOWN_CUSTOMER,
  UNKNOWN_SITE,
} from './services/returns';
export type * from './services/returns/types';
export type { ReturnSlipGrammar } from './services/returns/grammar';
export { coerceDate, coerceInt } from './utils/valueCoercion';
export {
  DEFAULT_SCORING_CONFIG,
  InvalidScoringConfigError,
  parsePriorityLevels,
  resolveScoringConfig,
  scoringConfigFromEnv,
} from './config/scoring';
export type { ScoringConfig, ScoringConfigInput, PriorityLevel, PriorityWeights, UrgencyRule } from './config/scoring';
export { noopLogger } from './infrastructure/engineLogger';
export type { EngineLogger } from './infrastructure/engineLogger';
