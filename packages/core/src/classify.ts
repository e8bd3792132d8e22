import type { CitationKey, KeyFormat } from './types.js';

// hep-ph/9905318, math.GT/0309136, cond-mat/0101001v2
const ARXIV_OLD = /^[a-z]+(?:-[a-z]+)*(?:\.[A-Z]{2})?\/\d{7}(?:v\d+)?$/;

// 2508.18080, 0704.0001v1
const ARXIV_NEW = /^\d{4}\.\d{4,5}(?:v\d+)?$/;

// YYYY JJJJJ VVVV M PPPP A, dot-padded to 19 characters: 2016PhRvL.116f1102A
const ADS_BIBCODE = /^\d{4}[A-Za-z&.]{5}[A-Za-z\d.]{4}[A-Za-z.][A-Za-z\d.]{4}[A-Z]$/;

// Author:YYYYxxx, e.g. LIGOScientific:2016aoc
const INSPIRE_TEXKEY = /^[A-Za-z][A-Za-z0-9'.-]*:\d{4}[a-z]{2,3}$/;

/**
 * Purely syntactic. When a string matches more than one shape the first rule
 * in this order wins: old arXiv, new arXiv, ADS bibcode, INSPIRE texkey.
 */
export function classifyKey(raw: string): KeyFormat {
  if (ARXIV_OLD.test(raw)) return 'arxiv-old';
  if (ARXIV_NEW.test(raw)) return 'arxiv-new';
  if (ADS_BIBCODE.test(raw)) return 'ads-bibcode';
  if (INSPIRE_TEXKEY.test(raw)) return 'inspire';
  return 'unrecognized';
}

export function toCitationKey(raw: string): CitationKey {
  return Object.freeze({ raw, format: classifyKey(raw) });
}

export function isArxivFormat(format: KeyFormat): boolean {
  return format === 'arxiv-new' || format === 'arxiv-old';
}

/** Strips a trailing version so "2508.18080v2" and "2508.18080" share an id. */
export function arxivIdOf(key: CitationKey): string | undefined {
  return isArxivFormat(key.format) ? key.raw.replace(/v\d+$/, '') : undefined;
}
