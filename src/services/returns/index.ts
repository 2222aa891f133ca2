import { resolveScoringConfig } from '../../config/scoring';
import type { ScoringConfigInput } from '../../config/scoring';
import { noopLogger } from '../../infrastructure/engineLogger';
import type { EngineLogger } from '../../infrastructure/engineLogger';
import { dedupeBySlipId } from './deduplicate';
import { buildDeliveryRecord } from './deliveryRecord';
import { segmentLine } from './fieldSegmenter';
import { DEFAULT_RETURN_SLIP_GRAMMAR } from './grammar';
import type { ReturnSlipGrammar } from './grammar';
import { classifyLine, mergeWrappedLines } from './lineClassifier';
import { scoreRecord, sortByPriority } from './priorityScorer';
import { validateRecord } from './recordValidator';
import type {
  DeliveryRecord,
  ExtractionResult,
  LineInput,
  LineRejection,
  LogicalLine,
  RejectionReason,
} from './types';

export type ExtractOptions = {
  grammar?: ReturnSlipGrammar;
  scoring?: ScoringConfigInput;
  /** Reference time for the age of open slips. */
  now?: Date;
  logger?: EngineLogger;
  order?: 'document' | 'priority';
};

type LineOutcome = { ok: true; record: DeliveryRecord } | { ok: false; reason: RejectionReason; detail: string };

function processLine(line: LogicalLine, grammar: ReturnSlipGrammar): LineOutcome {
  const segmented = segmentLine(line.text, grammar);
  if (!segmented.ok) return segmented;

  const record = buildDeliveryRecord(segmented.value, { lineIndex: line.lineIndex, page: line.page }, grammar);
  const validation = validateRecord(record, grammar);
  if (!validation.ok) return validation;

  return { ok: true, record };
}

function emptyHistogram(): Record<RejectionReason, number> {
  return { 'pattern-mismatch': 0, 'missing-identifier': 0, 'insufficient-fields': 0 };
}

/**
 * Runs one document's lines, in document order, through the extraction pipeline:
 * wrapped-status merge, classification, segmentation, name split, code extraction, coercion,
 * validation, slip dedup and priority scoring.
 *
 * A bad line never aborts the run: it is recorded in `rejections` with a reason code and tallied
 * in the summary. Only an invalid `scoring` option throws, before any line is read.
 */
export function extractReturnRecords(lines: LineInput[], options: ExtractOptions = {}): ExtractionResult {
  const grammar = options.grammar ?? DEFAULT_RETURN_SLIP_GRAMMAR;
  const scoring = resolveScoringConfig(options.scoring);
  const now = options.now ?? new Date();
  const logger = options.logger ?? noopLogger;

  const accepted: DeliveryRecord[] = [];
  const rejections: LineRejection[] = [];
  const rejectionReasons = emptyHistogram();
  let candidateLines = 0;

  const reject = (line: LogicalLine, reason: RejectionReason, detail: string) => {
    rejections.push({ lineIndex: line.lineIndex, page: line.page, reason, detail, text: line.text });
    rejectionReasons[reason] += 1;
    logger.debug(
      { event: 'returns.line.rejected', lineIndex: line.lineIndex, page: line.page, reason, detail },
      'returns.line.rejected'
    );
  };

  for (const line of mergeWrappedLines(lines, grammar)) {
    const kind = classifyLine(line.text, grammar);
    if (kind === 'HEADER' || kind === 'NOISE') continue;

    candidateLines += 1;
    if (kind === 'MALFORMED') {
      reject(line, 'pattern-mismatch', 'slip number not found');
      continue;
    }

    try {
      const outcome = processLine(line, grammar);
      if (outcome.ok) {
        accepted.push(outcome.record);
      } else {
        reject(line, outcome.reason, outcome.detail);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(
        { event: 'returns.line.failed', lineIndex: line.lineIndex, page: line.page, err: { message } },
        'returns.line.failed'
      );
      reject(line, 'pattern-mismatch', `unexpected error: ${message}`);
    }
  }

  const deduped = dedupeBySlipId(accepted);
  const scored = deduped.records.map((record) => scoreRecord(record, scoring, now));
  const records = options.order === 'priority' ? sortByPriority(scored) : scored;

  const summary = {
    totalLines: lines.length,
    candidateLines,
    acceptedCount: accepted.length,
    rejectedCount: rejections.length,
    duplicateCount: deduped.duplicateCount,
    flaggedCount: records.filter((r) => r.qualityWarnReasons.length > 0).length,
    rejectionReasons,
  };

  logger.info({ event: 'returns.run.completed', ...summary }, 'returns.run.completed');

  return { records, rejections, summary };
}

export { DEFAULT_RETURN_SLIP_GRAMMAR, createGrammar } from './grammar';
export type { ReturnSlipGrammar } from './grammar';
export { classifyLine, mergeWrappedLines, toRawLines } from './lineClassifier';
export { segmentLine } from './fieldSegmenter';
export { splitNames, UNKNOWN_CUSTOMER, UNKNOWN_SITE } from './nameSplitter';
export { extractTabletCodes } from './tabletCodes';
export { validateRecord } from './recordValidator';
export { dedupeBySlipId } from './deduplicate';
export { scoreRecord, sortByPriority } from './priorityScorer';
export type * from './types';
