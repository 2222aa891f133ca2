export type DedupeResult<T> = {
  records: T[];
  duplicateCount: number;
};

/**
 * One record per slip. Page-boundary re-extraction repeats rows, and the later rendering is the
 * more complete one, so the last occurrence wins and keeps its own position in document order.
 */
export function dedupeBySlipId<T extends { slipId: string }>(records: T[]): DedupeResult<T> {
  const lastIndexBySlip = new Map<string, number>();
  records.forEach((record, i) => lastIndexBySlip.set(record.slipId, i));

  const survivors = records.filter((record, i) => lastIndexBySlip.get(record.slipId) === i);
  return { records: survivors, duplicateCount: records.length - survivors.length };
}
