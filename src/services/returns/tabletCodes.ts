import { compileGrammar, DEFAULT_RETURN_SLIP_GRAMMAR } from './grammar';
import type { ReturnSlipGrammar } from './grammar';

export type TabletCodes = {
  tabletCodes: string[];
  openTabletCodes: string[];
  ignored: string[];
};

/**
 * Item codes from the tail of a row, e.g. "81, 134, 1666, 1708 1666M, 1708M".
 * Plain codes are 1-4 digits; open (exception) codes carry an uppercase suffix.
 * Repeats are kept: every code is one physical tablet.
 */
export function extractTabletCodes(
  tailSpan: string,
  grammar: ReturnSlipGrammar = DEFAULT_RETURN_SLIP_GRAMMAR
): TabletCodes {
  const compiled = compileGrammar(grammar);
  const tabletCodes: string[] = [];
  const openTabletCodes: string[] = [];
  const ignored: string[] = [];

  for (const token of tailSpan.split(/[\s,]+/)) {
    if (!token) continue;
    if (compiled.plainCodeToken.test(token)) {
      tabletCodes.push(token);
    } else if (compiled.openCodeToken.test(token)) {
      openTabletCodes.push(token);
    } else {
      ignored.push(token);
    }
  }

  return { tabletCodes, openTabletCodes, ignored };
}
