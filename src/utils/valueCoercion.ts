import { isValid, parse, parseISO } from 'date-fns';

export const PRIMARY_DATE_FORMAT = 'M/d/yyyy';

// Two-digit years first: `yyyy` also accepts "25" and reads it as year 25.
export const FALLBACK_DATE_FORMATS = [
  'M/d/yy',
  'M-d-yy',
  'M-d-yyyy',
  'yyyy-MM-dd',
  'MMM d yyyy',
  'MMM d, yyyy',
  'MMMM d yyyy',
  'MMMM d, yyyy',
  'd MMM yyyy',
];

// Anchors the two-digit year window (1950-2049).
const REFERENCE_DATE = new Date(2000, 0, 1);

const SENTINEL_TOKENS = new Set(['', 'yes', 'no']);
const PRIMARY_SHAPE = /^\d{1,2}\/\d{1,2}\/\d{4}$/;
const DIGITS = /^\d+$/;

function tryFormat(s: string, fmt: string): Date | null {
  const d = parse(s, fmt, REFERENCE_DATE);
  return isValid(d) ? d : null;
}

/**
 * coerceDate
 *
 * - Report dates are `M/D/YYYY`; anything else goes through a fixed list of permissive formats
 *   and finally ISO-8601.
 * - Status words (`Yes` / `No`) and empty cells are not dates.
 * - Returns null instead of throwing for any input.
 */
export function coerceDate(input: unknown): Date | null {
  if (input instanceof Date) return isValid(input) ? input : null;
  if (typeof input !== 'string') return null;

  const s = input.trim();
  if (SENTINEL_TOKENS.has(s.toLowerCase())) return null;

  if (PRIMARY_SHAPE.test(s)) {
    const d = tryFormat(s, PRIMARY_DATE_FORMAT);
    if (d) return d;
  }

  for (const fmt of FALLBACK_DATE_FORMATS) {
    const d = tryFormat(s, fmt);
    if (d) return d;
  }

  const iso = parseISO(s);
  return isValid(iso) ? iso : null;
}

/**
 * coerceInt
 *
 * Whole-token digits only ("12" -> 12). Anything else, including "12," or "-3", is 0.
 */
export function coerceInt(input: unknown): number {
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) && input >= 0 ? input : 0;
  }
  if (typeof input !== 'string') return 0;

  const s = input.trim();
  if (!DIGITS.test(s)) return 0;
  const n = Number.parseInt(s, 10);
  return Number.isSafeInteger(n) ? n : 0;
}
