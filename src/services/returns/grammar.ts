import type { DefinitiveStatus } from './types';

/**
 * A status word the extraction backend broke across a line boundary, e.g. `Ye` at the end of
 * one line and `s` alone on the next.
 */
export type WrappedStatus = {
  head: string;
  tail: string;
};

/**
 * Row grammar of the Outstanding Count Returns report.
 *
 * Field patterns are composed into anchored regexes, so they must not contain capturing groups
 * or anchors of their own.
 */
export type ReturnSlipGrammar = {
  prefix: string;
  warehouseCode: RegExp;
  slipNumber: RegExp;
  date: RegExp;
  jobsiteId: RegExp;
  costCenter: RegExp;
  statusWords: Record<DefinitiveStatus, string>;
  wrappedStatuses: WrappedStatus[];
  plainCode: RegExp;
  openCode: RegExp;
  minTokens: number;
  columnGapMinSpaces: number;
  companySuffixes: string[];
  headerWords: string[];
  minHeaderWords: number;
};

export const DEFAULT_RETURN_SLIP_GRAMMAR: ReturnSlipGrammar = {
  prefix: 'FL',
  warehouseCode: /[A-Za-z0-9]{2,4}/,
  slipNumber: /\d{9,12}/,
  date: /\d{1,2}[/-]\d{1,2}[/-](?:\d{4}|\d{2})/,
  jobsiteId: /\d+/,
  costCenter: /[A-Za-z0-9]+/,
  statusWords: { Yes: 'Yes', No: 'No' },
  wrappedStatuses: [
    { head: 'Ye', tail: 's' },
    { head: 'N', tail: 'o' },
  ],
  plainCode: /\d{1,4}/,
  openCode: /\d{1,4}[A-Z]+/,
  minTokens: 10,
  columnGapMinSpaces: 3,
  companySuffixes: [
    'corporation',
    'corp',
    'llc',
    'inc',
    'ltd',
    'construction',
    'builders',
    'services',
    'group',
    'company',
    'co',
    'development',
  ],
  headerWords: [
    'wh',
    'return',
    'packing',
    'slip',
    'date',
    'jobsite',
    'cost',
    'center',
    'invoice',
    'customer',
    'name',
    'definitive',
    'counted',
    'tablets',
    'total',
    'delay',
    'validation',
  ],
  minHeaderWords: 3,
};

export function createGrammar(overrides: Partial<ReturnSlipGrammar> = {}): ReturnSlipGrammar {
  return { ...DEFAULT_RETURN_SLIP_GRAMMAR, ...overrides };
}

export type CompiledGrammar = {
  anchors: RegExp;
  status: RegExp;
  dateToken: RegExp;
  slipToken: RegExp;
  plainCodeToken: RegExp;
  openCodeToken: RegExp;
  columnGap: RegExp;
  companySuffixes: Set<string>;
  headerWords: Set<string>;
};

const compiledCache = new WeakMap<ReturnSlipGrammar, CompiledGrammar>();

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function whole(re: RegExp): RegExp {
  return new RegExp(`^(?:${re.source})$`);
}

export function compileGrammar(grammar: ReturnSlipGrammar): CompiledGrammar {
  const cached = compiledCache.get(grammar);
  if (cached) return cached;

  const date = grammar.date.source;
  // prefix, warehouse code, slip, return date, jobsite, cost center, invoice start, invoice end
  const anchors = new RegExp(
    [
      `^\\s*(${escapeRegExp(grammar.prefix)})`,
      `(${grammar.warehouseCode.source})`,
      `(${grammar.slipNumber.source})`,
      `(${date})`,
      `(${grammar.jobsiteId.source})`,
      `(${grammar.costCenter.source})`,
      `(${date})`,
      `(${date})(?=\\s|$)`,
    ].join('\\s+')
  );

  const statusAlternatives = [
    escapeRegExp(grammar.statusWords.Yes),
    escapeRegExp(grammar.statusWords.No),
    ...grammar.wrappedStatuses.map((w) => `${escapeRegExp(w.head)}\\s+${escapeRegExp(w.tail)}`),
  ];
  const status = new RegExp(`(?<=^|\\s)(?:${statusAlternatives.join('|')})(?=\\s|$)`, 'g');

  const compiled: CompiledGrammar = {
    anchors,
    status,
    dateToken: whole(grammar.date),
    slipToken: whole(grammar.slipNumber),
    plainCodeToken: whole(grammar.plainCode),
    openCodeToken: whole(grammar.openCode),
    columnGap: new RegExp(` {${grammar.columnGapMinSpaces},}`),
    companySuffixes: new Set(grammar.companySuffixes.map((s) => s.toLowerCase())),
    headerWords: new Set(grammar.headerWords.map((s) => s.toLowerCase())),
  };
  compiledCache.set(grammar, compiled);
  return compiled;
}

/**
 * Maps a matched status token (possibly the merged `Ye s` form) to its status.
 * Returns null for text that is not a status word.
 */
export function resolveStatus(token: string, grammar: ReturnSlipGrammar): DefinitiveStatus | null {
  const joined = token.replace(/\s+/g, '');
  if (joined === grammar.statusWords.Yes) return 'Yes';
  if (joined === grammar.statusWords.No) return 'No';
  return null;
}

export function tokenize(text: string): string[] {
  return text.trim().split(/\s+/).filter(Boolean);
}
