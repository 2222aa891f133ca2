import { coerceDate, coerceInt } from '../../utils/valueCoercion';
import type { SegmentedLine } from './fieldSegmenter';
import type { ReturnSlipGrammar } from './grammar';
import { splitNames } from './nameSplitter';
import { computeQualityWarnReasons } from './quality';
import { extractTabletCodes } from './tabletCodes';
import type { DeliveryRecord, LineSource } from './types';

function emptyToNull(value: string): string | null {
  const v = value.trim();
  return v ? v : null;
}

export function buildDeliveryRecord(
  segmented: SegmentedLine,
  source: LineSource,
  grammar: ReturnSlipGrammar
): DeliveryRecord {
  const { customerName, siteName } = splitNames(segmented.nameSpan, grammar);
  const { tabletCodes, openTabletCodes } = extractTabletCodes(segmented.tailSpan, grammar);

  const returnDate = coerceDate(segmented.returnDate);
  const invoiceStartDate = coerceDate(segmented.invoiceStartDate);
  const invoiceEndDate = coerceDate(segmented.invoiceEndDate);
  const isDefinitive = segmented.status;
  const countedDate = isDefinitive === 'Yes' ? coerceDate(segmented.countedDate) : null;

  const totalTablets = coerceInt(segmented.totals.totalTablets);
  const totalOpen = coerceInt(segmented.totals.totalOpen);

  return {
    warehouse: segmented.prefix,
    warehouseCode: emptyToNull(segmented.warehouseCode),
    slipId: segmented.slipNumber,
    returnDate,
    jobsiteId: emptyToNull(segmented.jobsiteId),
    costCenter: emptyToNull(segmented.costCenter),
    invoiceStartDate,
    invoiceEndDate,
    customerName,
    siteName,
    isDefinitive,
    countedDate,
    tabletCodes,
    openTabletCodes,
    totalTablets,
    totalOpen,
    countingDelay: coerceInt(segmented.totals.countingDelay),
    validationDelay: coerceInt(segmented.totals.validationDelay),
    qualityWarnReasons: computeQualityWarnReasons({
      isDefinitive,
      returnDate,
      invoiceStartDate,
      invoiceEndDate,
      tabletCodes,
      openTabletCodes,
      totalTablets,
      totalOpen,
      countedDateToken: segmented.countedDate,
      countedDate,
    }),
    source,
  };
}
