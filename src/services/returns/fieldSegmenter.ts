import { compileGrammar, resolveStatus, tokenize } from './grammar';
import type { ReturnSlipGrammar } from './grammar';
import type { DefinitiveStatus, RejectionReason } from './types';

export type TrailingTotals = {
  totalTablets: string;
  totalOpen: string;
  countingDelay: string;
  validationDelay: string;
};

/**
 * Raw cells of one report row. Every value is the exact text of the source line; nothing is
 * coerced here.
 */
export type SegmentedLine = {
  prefix: string;
  warehouseCode: string;
  slipNumber: string;
  returnDate: string;
  jobsiteId: string;
  costCenter: string;
  invoiceStartDate: string;
  invoiceEndDate: string;
  nameSpan: string;
  status: DefinitiveStatus;
  statusToken: string;
  countedDate: string | null;
  tailSpan: string;
  totals: TrailingTotals;
};

export type SegmentFailure = {
  ok: false;
  reason: RejectionReason;
  detail: string;
};

export type SegmentResult = { ok: true; value: SegmentedLine } | SegmentFailure;

function fail(reason: RejectionReason, detail: string): SegmentFailure {
  return { ok: false, reason, detail };
}

/**
 * Row layout:
 *
 *   FL <wh> <slip> <return date> <jobsite> <cost center> <inv start> <inv end>
 *     <customer + site names> <Yes|No> [counted date]
 *     <codes...> <total tablets> <open codes...> <total open> <counting delay> <validation delay>
 *
 * The eight leading cells must match in order with no gaps. The open-code column sits between
 * total tablets and total open, so the trailing totals are found by walking back from the end.
 */
export function segmentLine(text: string, grammar: ReturnSlipGrammar): SegmentResult {
  const compiled = compileGrammar(grammar);

  const anchors = compiled.anchors.exec(text);
  if (!anchors) {
    return fail('pattern-mismatch', 'leading anchors did not match in order');
  }
  const [, prefix, warehouseCode, slipNumber, returnDate, jobsiteId, costCenter, invoiceStartDate, invoiceEndDate] =
    anchors;

  const rest = text.slice(anchors[0].length);

  // Site names may contain "No"; the tail never does, so the last status word is the column.
  const statusMatches = Array.from(rest.matchAll(compiled.status));
  const statusMatch = statusMatches[statusMatches.length - 1];
  if (!statusMatch) {
    return fail('pattern-mismatch', 'definitive status token not found');
  }
  const statusToken = statusMatch[0];
  const status = resolveStatus(statusToken, grammar);
  if (!status) {
    return fail('pattern-mismatch', `unrecognised status token "${statusToken}"`);
  }

  const statusAt = statusMatch.index ?? 0;
  const nameSpan = rest.slice(0, statusAt).trim();
  const tail = tokenize(rest.slice(statusAt + statusToken.length));

  let countedDate: string | null = null;
  if (tail.length > 0 && compiled.dateToken.test(tail[0])) {
    countedDate = tail[0];
    tail.shift();
  }

  if (tail.length < 4) {
    return fail('insufficient-fields', `row truncated: ${tail.length} tail token(s), 4 trailing totals required`);
  }

  const n = tail.length;
  let tabletsAt = n - 4;
  while (tabletsAt >= 0 && compiled.openCodeToken.test(tail[tabletsAt].replace(/,+$/, ''))) {
    tabletsAt -= 1;
  }
  if (tabletsAt < 0) {
    return fail('insufficient-fields', 'total tablets column missing before open codes');
  }

  const totals: TrailingTotals = {
    totalTablets: tail[tabletsAt],
    totalOpen: tail[n - 3],
    countingDelay: tail[n - 2],
    validationDelay: tail[n - 1],
  };
  const codeTokens = [...tail.slice(0, tabletsAt), ...tail.slice(tabletsAt + 1, n - 3)];

  return {
    ok: true,
    value: {
      prefix,
      warehouseCode,
      slipNumber,
      returnDate,
      jobsiteId,
      costCenter,
      invoiceStartDate,
      invoiceEndDate,
      nameSpan,
      status,
      statusToken,
      countedDate,
      tailSpan: codeTokens.join(' '),
      totals,
    },
  };
}
