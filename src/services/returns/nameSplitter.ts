import { compileGrammar, DEFAULT_RETURN_SLIP_GRAMMAR, tokenize } from './grammar';
import type { ReturnSlipGrammar } from './grammar';

export const UNKNOWN_CUSTOMER = 'Unknown Customer';
export const UNKNOWN_SITE = 'Unknown Site';

export type NameSplitStrategy = 'column-gap' | 'company-suffix' | 'midpoint' | 'empty';

export type SplitNames = {
  customerName: string;
  siteName: string;
  strategy: NameSplitStrategy;
};

function withSentinels(customer: string, site: string, strategy: NameSplitStrategy): SplitNames {
  return {
    customerName: customer.trim() || UNKNOWN_CUSTOMER,
    siteName: site.trim() || UNKNOWN_SITE,
    strategy,
  };
}

function normalizeSuffixToken(token: string): string {
  return token.toLowerCase().replace(/[.,]+$/, '');
}

/**
 * Splits the collapsed "customer + job site" cell. Heuristics, first match wins:
 *
 * 1. a run of >= 3 spaces left over from the table layout (first run)
 * 2. right after the rightmost company-suffix keyword (Corp, LLC, Group, ...)
 * 3. the middle of the token list
 */
export function splitNames(span: string, grammar: ReturnSlipGrammar = DEFAULT_RETURN_SLIP_GRAMMAR): SplitNames {
  const compiled = compileGrammar(grammar);
  const text = span.trim();
  if (!text) return withSentinels('', '', 'empty');

  const gap = compiled.columnGap.exec(text);
  if (gap) {
    return withSentinels(text.slice(0, gap.index), text.slice(gap.index + gap[0].length), 'column-gap');
  }

  const tokens = tokenize(text);

  let suffixAt = -1;
  tokens.forEach((token, i) => {
    if (compiled.companySuffixes.has(normalizeSuffixToken(token))) suffixAt = i;
  });
  if (suffixAt >= 0) {
    return withSentinels(
      tokens.slice(0, suffixAt + 1).join(' '),
      tokens.slice(suffixAt + 1).join(' '),
      'company-suffix'
    );
  }

  const mid = Math.floor(tokens.length / 2);
  return withSentinels(tokens.slice(0, mid).join(' '), tokens.slice(mid).join(' '), 'midpoint');
}
