import { compileGrammar, tokenize } from './grammar';
import type { ReturnSlipGrammar } from './grammar';
import type { LineInput, LineKind, LogicalLine, RawLine } from './types';

export function toRawLines(pageText: string, page: number | null = null): RawLine[] {
  return pageText.split(/\r?\n/).map((text) => ({ text, page }));
}

type PhysicalLine = { text: string; page: number | null };

function normalizeInput(line: LineInput): PhysicalLine {
  if (typeof line === 'string') return { text: line, page: null };
  return { text: line.text, page: line.page ?? null };
}

export function classifyLine(text: string, grammar: ReturnSlipGrammar): LineKind {
  const compiled = compileGrammar(grammar);
  const tokens = tokenize(text);
  if (tokens.length === 0) return 'NOISE';

  if (tokens[0] === grammar.prefix && tokens.length >= grammar.minTokens) {
    return tokens.some((t) => compiled.slipToken.test(t)) ? 'DATA' : 'MALFORMED';
  }

  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  const headerHits = new Set(words.filter((w) => compiled.headerWords.has(w)));
  if (headerHits.size >= grammar.minHeaderWords) return 'HEADER';

  return 'NOISE';
}

function endsWithWrappedHead(text: string, next: string, grammar: ReturnSlipGrammar): boolean {
  const tokens = tokenize(text);
  const last = tokens[tokens.length - 1];
  const continuation = next.trim();
  return grammar.wrappedStatuses.some((w) => last === w.head && continuation === w.tail);
}

function isTailContinuation(text: string, grammar: ReturnSlipGrammar): boolean {
  const compiled = compileGrammar(grammar);
  const first = tokenize(text)[0];
  if (!first || first === grammar.prefix) return false;
  return compiled.dateToken.test(first) || /^\d/.test(first);
}

/**
 * Pre-pass for the wrapped status artifact: the backend sometimes emits `... Resid Ye` / `s` /
 * `9/16/2025 280, 1486 2 0 14 1` for one row. The pieces are merged back into one logical line
 * and the continuation lines are consumed.
 */
export function mergeWrappedLines(lines: LineInput[], grammar: ReturnSlipGrammar): LogicalLine[] {
  const physical = lines.map(normalizeInput);
  const out: LogicalLine[] = [];

  let i = 0;
  while (i < physical.length) {
    const current = physical[i];
    const next = physical[i + 1];

    if (next && endsWithWrappedHead(current.text, next.text, grammar)) {
      let text = `${current.text.trimEnd()} ${next.text.trim()}`;
      let mergedLineCount = 2;

      const rest = physical[i + 2];
      if (rest && isTailContinuation(rest.text, grammar)) {
        text = `${text} ${rest.text.trim()}`;
        mergedLineCount = 3;
      }

      out.push({ text, lineIndex: i, page: current.page, mergedLineCount });
      i += mergedLineCount;
      continue;
    }

    out.push({ text: current.text, lineIndex: i, page: current.page, mergedLineCount: 1 });
    i += 1;
  }

  return out;
}
