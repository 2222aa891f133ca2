import { describe, it, expect } from 'vitest';
import { computeQualityWarnReasons } from '../../../src/services/returns/quality';
import type { QualityInput } from '../../../src/services/returns/quality';

function makeInput(overrides: Partial<QualityInput> = {}): QualityInput {
  return {
    isDefinitive: 'No',
    returnDate: new Date(2025, 8, 2),
    invoiceStartDate: new Date(2025, 7, 31),
    invoiceEndDate: new Date(2025, 8, 30),
    tabletCodes: ['81', '134'],
    openTabletCodes: ['134A'],
    totalTablets: 2,
    totalOpen: 1,
    countedDateToken: null,
    countedDate: null,
    ...overrides,
  };
}

describe('computeQualityWarnReasons', () => {
  it('no warnings when totals agree with the code lists', () => {
    expect(computeQualityWarnReasons(makeInput())).toEqual([]);
  });

  it('OPEN_EXCEEDS_TOTAL when more tablets are open than returned', () => {
    const reasons = computeQualityWarnReasons(
      makeInput({ tabletCodes: ['81'], openTabletCodes: ['81A', '82B'], totalTablets: 1, totalOpen: 2 })
    );
    expect(reasons).toEqual(['OPEN_EXCEEDS_TOTAL']);
  });

  it('TABLET_COUNT_MISMATCH when the plain code list disagrees with total tablets', () => {
    expect(computeQualityWarnReasons(makeInput({ totalTablets: 3 }))).toEqual(['TABLET_COUNT_MISMATCH']);
  });

  it('OPEN_COUNT_MISMATCH when the open code list disagrees with total open', () => {
    expect(computeQualityWarnReasons(makeInput({ openTabletCodes: [] }))).toEqual(['OPEN_COUNT_MISMATCH']);
  });

  it('UNPARSED_DATE when a leading date is null', () => {
    expect(computeQualityWarnReasons(makeInput({ returnDate: null }))).toEqual(['UNPARSED_DATE']);
    expect(computeQualityWarnReasons(makeInput({ invoiceStartDate: null }))).toEqual(['UNPARSED_DATE']);
    expect(computeQualityWarnReasons(makeInput({ invoiceEndDate: null }))).toEqual(['UNPARSED_DATE']);
  });

  it('UNPARSED_DATE when a counted date after Yes did not coerce', () => {
    const reasons = computeQualityWarnReasons(
      makeInput({ isDefinitive: 'Yes', countedDateToken: '2/30/2025', countedDate: null })
    );
    expect(reasons).toEqual(['UNPARSED_DATE']);
  });

  it('a coerced counted date after Yes is not a warning', () => {
    const reasons = computeQualityWarnReasons(
      makeInput({ isDefinitive: 'Yes', countedDateToken: '9/10/2025', countedDate: new Date(2025, 8, 10) })
    );
    expect(reasons).toEqual([]);
  });

  it('COUNTED_DATE_WITHOUT_DEFINITIVE when a date follows No', () => {
    expect(computeQualityWarnReasons(makeInput({ countedDateToken: '9/10/2025' }))).toEqual([
      'COUNTED_DATE_WITHOUT_DEFINITIVE',
    ]);
  });

  it('reports every warning that applies, in a fixed order', () => {
    const reasons = computeQualityWarnReasons(
      makeInput({
        tabletCodes: [],
        openTabletCodes: [],
        totalTablets: 1,
        totalOpen: 4,
        returnDate: null,
        countedDateToken: '9/10/2025',
      })
    );
    expect(reasons).toEqual([
      'OPEN_EXCEEDS_TOTAL',
      'TABLET_COUNT_MISMATCH',
      'OPEN_COUNT_MISMATCH',
      'UNPARSED_DATE',
      'COUNTED_DATE_WITHOUT_DEFINITIVE',
    ]);
  });
});
