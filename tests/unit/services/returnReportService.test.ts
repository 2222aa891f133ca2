import { describe, it, expect, vi } from 'vitest';
import { createReturnReportService } from '../../../src/services/returnReportService';
import { COUNTED_SLIP_LINE, HEADER_LINE, OPEN_SLIP_LINE, WRAPPED_ROW } from '../returns/sampleLines';

function makeService() {
  const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
  const service = createReturnReportService({ logger, now: () => new Date(2025, 9, 2) });
  return { service, logger };
}

describe('returnReportService', () => {
  it('numbers pages from 1 and keeps document-wide line indexes', () => {
    const { service, logger } = makeService();

    const { records } = service.extractPages([`${HEADER_LINE}\n${OPEN_SLIP_LINE}`, `Page 2 of 2\n${COUNTED_SLIP_LINE}`]);

    expect(records.map((r) => [r.slipId, r.source])).toEqual([
      ['729000018669', { lineIndex: 1, page: 1 }],
      ['729000018709', { lineIndex: 3, page: 2 }],
    ]);
    expect(logger.debug).toHaveBeenCalledWith(
      { event: 'returns.pages.loaded', pageCount: 2, lineCount: 4 },
      'returns.pages.loaded'
    );
  });

  it('merges a status wrapped across a page break', () => {
    const { service } = makeService();

    const { records } = service.extractPages([WRAPPED_ROW[0], `${WRAPPED_ROW[1]}\n${WRAPPED_ROW[2]}`]);

    expect(records).toHaveLength(1);
    expect(records[0].isDefinitive).toBe('Yes');
    expect(records[0].source).toEqual({ lineIndex: 0, page: 1 });
  });

  it('scores with the injected clock and sorts on request', () => {
    const { service, logger } = makeService();

    const { records, summary } = service.extractLines([COUNTED_SLIP_LINE, OPEN_SLIP_LINE], { order: 'priority' });

    expect(records.map((r) => [r.slipId, r.daysSinceReturn])).toEqual([
      ['729000018669', 30],
      ['729000018709', 9],
    ]);
    expect(logger.info).toHaveBeenCalledWith({ event: 'returns.run.completed', ...summary }, 'returns.run.completed');
  });

  it('falls back to a pino logger', () => {
    const service = createReturnReportService({ now: () => new Date(2025, 9, 2) });

    const { records } = service.extractLines([OPEN_SLIP_LINE]);

    expect(records.map((r) => r.slipId)).toEqual(['729000018669']);
  });
});
