// packages/mapper/src/extractor.ts
// Pulls mapping candidates out of a free-text prompt: verbatim key identifiers,
// quoted phrases, and bounded sliding windows over the remaining words.

import type { ComparisonOperator, PhraseCandidate } from '@lexirule/core';
import stopwordList from '../data/stopwords.json';

export interface ExtractOptions {
  maxPhraseWords?: number;   // window length bound
  maxCandidates?: number;    // bound on non-literal candidates; identifiers are always kept
}

export const DEFAULT_MAX_PHRASE_WORDS = 3;
export const DEFAULT_MAX_CANDIDATES = 64;

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);
const IDENT_CHAR = /[A-Za-z0-9_]/;

type Span = readonly [number, number];

// ---------- literal identifiers ----------
function boundedBefore(text: string, start: number): boolean {
  if (start === 0) return true;
  const prev = text[start - 1];
  return !IDENT_CHAR.test(prev) && prev !== '.';
}

function boundedAfter(text: string, end: number): boolean {
  if (end >= text.length) return true;
  const next = text[end];
  if (IDENT_CHAR.test(next)) return false;
  // a trailing full stop ends the sentence; a dot followed by more name does not
  if (next === '.' && end + 1 < text.length && IDENT_CHAR.test(text[end + 1])) return false;
  return true;
}

function findLiterals(text: string, identifiers: Iterable<string>): PhraseCandidate[] {
  const out: PhraseCandidate[] = [];
  for (const id of identifiers) {
    if (!id) continue;
    let from = 0;
    while (from <= text.length - id.length) {
      const at = text.indexOf(id, from);
      if (at < 0) break;
      const end = at + id.length;
      if (boundedBefore(text, at) && boundedAfter(text, end)) {
        out.push({ text: id, span: [at, end], literal: true });
      }
      from = at + 1;
    }
  }
  return out;
}

function covered(spans: readonly Span[], start: number, end: number): boolean {
  return spans.some(([s, e]) => start < e && end > s);
}

// ---------- quoted phrases ----------
function findQuoted(text: string, literalSpans: readonly Span[]): PhraseCandidate[] {
  const out: PhraseCandidate[] = [];
  const re = /"([^"\n]+)"/g;
  for (const m of text.matchAll(re)) {
    const inner = m[1];
    const lead = inner.length - inner.trimStart().length;
    const phrase = inner.trim();
    if (!phrase || m.index === undefined) continue;
    const start = m.index + 1 + lead;
    const end = start + phrase.length;
    if (covered(literalSpans, start, end)) continue;
    out.push({ text: phrase, span: [start, end], literal: false });
  }
  return out;
}

// ---------- sliding windows ----------
interface Token { word: string; start: number; end: number }

function tokenRuns(text: string, literalSpans: readonly Span[]): Token[][] {
  const runs: Token[][] = [];
  let run: Token[] = [];
  let lastEnd = -1;
  const flush = () => { if (run.length) runs.push(run); run = []; };

  for (const m of text.matchAll(/[A-Za-z0-9_']+/g)) {
    if (m.index === undefined) continue;
    const tok: Token = { word: m[0], start: m.index, end: m.index + m[0].length };

    // anything but whitespace between two words (punctuation, quotes, dots) breaks the run
    if (lastEnd >= 0 && /\S/.test(text.slice(lastEnd, tok.start))) flush();
    lastEnd = tok.end;

    const lower = tok.word.toLowerCase().replace(/'s$/, '');
    const isNumber = /^\d+$/.test(tok.word);
    if (isNumber || STOPWORDS.has(lower) || covered(literalSpans, tok.start, tok.end)) {
      flush();
      continue;
    }
    run.push(tok);
  }
  flush();
  return runs;
}

function windows(text: string, run: readonly Token[], maxWords: number): PhraseCandidate[] {
  const out: PhraseCandidate[] = [];
  for (let i = 0; i < run.length; i++) {
    for (let n = 1; n <= maxWords && i + n <= run.length; n++) {
      const start = run[i].start;
      const end = run[i + n - 1].end;
      out.push({ text: text.slice(start, end), span: [start, end], literal: false });
    }
  }
  return out;
}

function byPosition(a: PhraseCandidate, b: PhraseCandidate): number {
  if (a.span[0] !== b.span[0]) return a.span[0] - b.span[0];
  if (a.span[1] !== b.span[1]) return a.span[1] - b.span[1];
  return Number(b.literal) - Number(a.literal);
}

/**
 * Extracts candidate phrases from a prompt. Order is by first occurrence,
 * shorter spans first; duplicates are kept. `maxCandidates` trims the
 * windows and quoted phrases, never a verbatim identifier. Never throws.
 */
export function extractPhrases(
  prompt: string,
  identifiers: Iterable<string>,
  opts: ExtractOptions = {}
): PhraseCandidate[] {
  if (typeof prompt !== 'string' || prompt.trim() === '') return [];
  const maxWords = Math.max(1, Math.floor(opts.maxPhraseWords ?? DEFAULT_MAX_PHRASE_WORDS));
  const maxCandidates = Math.max(0, Math.floor(opts.maxCandidates ?? DEFAULT_MAX_CANDIDATES));

  const literals = findLiterals(prompt, identifiers);
  const literalSpans = literals.map((l) => l.span);

  const phrases = [
    ...findQuoted(prompt, literalSpans),
    ...tokenRuns(prompt, literalSpans).flatMap((run) => windows(prompt, run, maxWords))
  ].sort(byPosition).slice(0, maxCandidates);
  return [...literals, ...phrases].sort(byPosition);
}

// ---------- numbers with their comparator phrase ----------
export interface NumericMention {
  value: number;
  span: Span;
  comparator?: ComparisonOperator;
}

// order matters: "no more than" must win over "more than"
const COMPARATOR_PHRASES: ReadonlyArray<[RegExp, ComparisonOperator]> = [
  [/(?:\bat least|\bno less than|\bnot less than|\bminimum(?: of)?|\bmin\.?|>=)\s*$/, '>='],
  [/(?:\bat most|\bno more than|\bnot more than|\bmaximum(?: of)?|\bmax\.?|\bup to|<=)\s*$/, '<='],
  [/(?:\bnot equal to|\bother than|!=)\s*$/, '!='],
  [/(?:\bmore than|\bgreater than|\babove|\bover|\bexceeds?|\bexceeding|>)\s*$/, '>'],
  [/(?:\bless than|\bfewer than|\bbelow|\bunder|<)\s*$/, '<'],
  [/(?:\bequal to|\bequals|\bexactly|==|=)\s*$/, '==']
];

export function extractNumbers(prompt: string): NumericMention[] {
  if (typeof prompt !== 'string') return [];
  const out: NumericMention[] = [];
  for (const m of prompt.matchAll(/(?<![A-Za-z0-9_.])-?\d+(?:\.\d+)?(?![A-Za-z0-9_])/g)) {
    if (m.index === undefined) continue;
    const start = m.index;
    const end = start + m[0].length;
    const clauseStart = Math.max(
      prompt.lastIndexOf(',', start),
      prompt.lastIndexOf(';', start),
      prompt.lastIndexOf('. ', start)
    );
    const tail = prompt.slice(Math.max(clauseStart + 1, start - 32), start).toLowerCase();
    const hit = COMPARATOR_PHRASES.find(([re]) => re.test(tail));
    out.push({ value: Number(m[0]), span: [start, end], ...(hit ? { comparator: hit[1] } : {}) });
  }
  return out;
}
