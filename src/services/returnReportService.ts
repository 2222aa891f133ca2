import { config } from '../config/env';
import { scoringConfigFromEnv } from '../config/scoring';
import type { EngineLogger } from '../infrastructure/engineLogger';
import { createLogger } from '../infrastructure/logger';
import { createGrammar, extractReturnRecords, toRawLines } from './returns';
import type { ExtractOptions } from './returns';
import type { ExtractionResult, LineInput } from './returns/types';

export type ReturnReportServiceDeps = {
  logger?: EngineLogger;
  now?: () => Date;
};

type RunOptions = Pick<ExtractOptions, 'order'>;

/**
 * Extraction wired to the environment: row prefix, priority weights and levels come from
 * `config`, logs go to pino unless a logger is injected.
 */
export function createReturnReportService(deps: ReturnReportServiceDeps = {}) {
  const logger = deps.logger ?? createLogger({ module: 'returns' });
  const clock = deps.now ?? (() => new Date());
  const grammar = createGrammar({ prefix: config.RETURN_ROW_PREFIX });
  const scoring = scoringConfigFromEnv(config);

  /** Lines of one document, already in document order. */
  function extractLines(lines: LineInput[], options: RunOptions = {}): ExtractionResult {
    return extractReturnRecords(lines, { grammar, scoring, logger, now: clock(), order: options.order });
  }

  /**
   * One text block per page, as text-mode backends return them. Pages are numbered from 1 and
   * processed as one document so rows wrapped across a page break still merge.
   */
  function extractPages(pages: string[], options: RunOptions = {}): ExtractionResult {
    const lines = pages.flatMap((text, i) => toRawLines(text, i + 1));
    logger.debug({ event: 'returns.pages.loaded', pageCount: pages.length, lineCount: lines.length }, 'returns.pages.loaded');
    return extractLines(lines, options);
  }

  return { extractLines, extractPages };
}

export type ReturnReportService = ReturnType<typeof createReturnReportService>;
