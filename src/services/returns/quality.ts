import type { DeliveryRecord, QualityWarnReason } from './types';

export type QualityInput = Pick<
  DeliveryRecord,
  | 'isDefinitive'
  | 'returnDate'
  | 'invoiceStartDate'
  | 'invoiceEndDate'
  | 'tabletCodes'
  | 'openTabletCodes'
  | 'totalTablets'
  | 'totalOpen'
> & {
  countedDateToken: string | null;
  countedDate: Date | null;
};

/**
 * Report totals do not always agree with the code lists. These are flagged for review and never
 * reject the row.
 */
export function computeQualityWarnReasons(input: QualityInput): QualityWarnReason[] {
  const warnReasons: QualityWarnReason[] = [];

  if (input.totalOpen > input.totalTablets) warnReasons.push('OPEN_EXCEEDS_TOTAL');
  if (input.tabletCodes.length !== input.totalTablets) warnReasons.push('TABLET_COUNT_MISMATCH');
  if (input.openTabletCodes.length !== input.totalOpen) warnReasons.push('OPEN_COUNT_MISMATCH');

  const dateMissing =
    !input.returnDate ||
    !input.invoiceStartDate ||
    !input.invoiceEndDate ||
    (input.isDefinitive === 'Yes' && input.countedDateToken !== null && !input.countedDate);
  if (dateMissing) warnReasons.push('UNPARSED_DATE');

  if (input.isDefinitive === 'No' && input.countedDateToken !== null) {
    warnReasons.push('COUNTED_DATE_WITHOUT_DEFINITIVE');
  }

  return warnReasons;
}
