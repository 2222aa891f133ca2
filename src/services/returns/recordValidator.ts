import { compileGrammar } from './grammar';
import type { ReturnSlipGrammar } from './grammar';
import type { DeliveryRecord, RejectionReason } from './types';

export const MIN_LEADING_FIELDS = 3;

export type ValidationResult = { ok: true } | { ok: false; reason: RejectionReason; detail: string };

function present(value: string | Date | null): boolean {
  if (value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  return true;
}

export function validateRecord(record: DeliveryRecord, grammar: ReturnSlipGrammar): ValidationResult {
  const compiled = compileGrammar(grammar);

  if (record.warehouse !== grammar.prefix) {
    return { ok: false, reason: 'pattern-mismatch', detail: `prefix "${record.warehouse}" is not "${grammar.prefix}"` };
  }
  if (!present(record.warehouseCode)) {
    return { ok: false, reason: 'missing-identifier', detail: 'warehouse code is empty' };
  }
  if (!present(record.slipId) || !compiled.slipToken.test(record.slipId)) {
    return { ok: false, reason: 'missing-identifier', detail: `slip id "${record.slipId}" is not a slip number` };
  }

  const leading = [record.warehouseCode, record.slipId, record.returnDate, record.jobsiteId, record.costCenter];
  const filled = leading.filter(present).length;
  if (filled < MIN_LEADING_FIELDS) {
    return {
      ok: false,
      reason: 'insufficient-fields',
      detail: `${filled} of ${leading.length} leading fields present, ${MIN_LEADING_FIELDS} required`,
    };
  }

  return { ok: true };
}
