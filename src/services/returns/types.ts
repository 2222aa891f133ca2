export type RawLine = {
  text: string;
  page?: number | null;
};

export type LineInput = RawLine | string;

/**
 * A physical line after the wrapped-status pre-pass. `lineIndex` and `page` point at the
 * first physical line it was built from.
 */
export type LogicalLine = {
  text: string;
  lineIndex: number;
  page: number | null;
  mergedLineCount: number;
};

export type LineKind = 'DATA' | 'MALFORMED' | 'HEADER' | 'NOISE';

export type RejectionReason = 'pattern-mismatch' | 'missing-identifier' | 'insufficient-fields';

export type DefinitiveStatus = 'Yes' | 'No';

export type QualityWarnReason =
  | 'OPEN_EXCEEDS_TOTAL'
  | 'TABLET_COUNT_MISMATCH'
  | 'OPEN_COUNT_MISMATCH'
  | 'UNPARSED_DATE'
  | 'COUNTED_DATE_WITHOUT_DEFINITIVE';

export type LineSource = {
  lineIndex: number;
  page: number | null;
};

export type DeliveryRecord = {
  warehouse: string;
  warehouseCode: string | null;
  slipId: string;
  returnDate: Date | null;
  jobsiteId: string | null;
  costCenter: string | null;
  invoiceStartDate: Date | null;
  invoiceEndDate: Date | null;
  customerName: string;
  siteName: string;
  isDefinitive: DefinitiveStatus;
  countedDate: Date | null;
  tabletCodes: string[];
  openTabletCodes: string[];
  totalTablets: number;
  totalOpen: number;
  countingDelay: number;
  validationDelay: number;
  qualityWarnReasons: QualityWarnReason[];
  source: LineSource;
};

export type ScoredDeliveryRecord = DeliveryRecord & {
  daysSinceReturn: number;
  priorityScore: number;
  priorityLevel: string;
  urgencyCategory: string;
};

export type LineRejection = {
  lineIndex: number;
  page: number | null;
  reason: RejectionReason;
  detail: string;
  text: string;
};

export type ExtractionSummary = {
  totalLines: number;
  candidateLines: number;
  acceptedCount: number;
  rejectedCount: number;
  duplicateCount: number;
  flaggedCount: number;
  rejectionReasons: Record<RejectionReason, number>;
};

export type ExtractionResult = {
  records: ScoredDeliveryRecord[];
  rejections: LineRejection[];
  summary: ExtractionSummary;
};
