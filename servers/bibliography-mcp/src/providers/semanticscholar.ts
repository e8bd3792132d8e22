import {
  arxivIdOf,
  buildUserAgent,
  extractBibtexKey,
  failureFromError,
  getJSON,
  parseResponse,
  type CitationKey,
  type FetchOutcome,
  type SourceAdapter
} from '@citefetch/core';
import { z } from 'zod';
import { getInspireIds, type InspireOptions } from './inspire.js';

const BASE = 'https://api.semanticscholar.org/graph/v1';

export interface SemanticScholarOptions extends InspireOptions {
  apiKey?: string;
}

const paperSchema = z.object({
  paperId: z.string(),
  externalIds: z.record(z.union([z.string(), z.number()])).nullish(),
  citationStyles: z.object({ bibtex: z.string().nullish() }).nullish()
});

export type SemanticScholarPaper = z.infer<typeof paperSchema>;

function externalId(paper: SemanticScholarPaper, name: string): string | undefined {
  const value = paper.externalIds?.[name];
  return value === undefined ? undefined : String(value);
}

async function paperIdFor(key: CitationKey, options: SemanticScholarOptions): Promise<string | null> {
  const arxivId = arxivIdOf(key);
  if (arxivId) return `arXiv:${arxivId}`;

  if (key.format === 'inspire') {
    const ids = await getInspireIds(key, options);
    if (ids?.arxivId) return `arXiv:${ids.arxivId}`;
    if (ids?.doi) return `DOI:${ids.doi}`;
  }

  return null;
}

export async function getSemanticScholarPaper(
  paperId: string,
  options: SemanticScholarOptions = {}
): Promise<SemanticScholarPaper> {
  const url = `${BASE}/paper/${encodeURI(paperId)}?fields=externalIds,citationStyles`;
  const headers: Record<string, string> = { 'User-Agent': buildUserAgent(options.contactEmail) };
  if (options.apiKey) {
    headers['x-api-key'] = options.apiKey;
  }

  const { json } = await getJSON(url, { headers, timeoutMs: options.timeoutMs });
  return parseResponse(paperSchema, json, url);
}

export function createSemanticScholarAdapter(options: SemanticScholarOptions = {}): SourceAdapter {
  return {
    name: 'semantic-scholar',
    async fetch(key: CitationKey): Promise<FetchOutcome> {
      if (key.format === 'ads-bibcode' || key.format === 'unrecognized') {
        return { ok: false, reason: 'not-found', message: `Semantic Scholar cannot look up ${key.format} keys` };
      }

      try {
        const paperId = await paperIdFor(key, options);
        if (!paperId) {
          return { ok: false, reason: 'not-found', message: `No arXiv id or DOI known for ${key.raw}` };
        }

        const paper = await getSemanticScholarPaper(paperId, options);
        const bibtex = paper.citationStyles?.bibtex?.trim();
        const sourceKey = bibtex ? extractBibtexKey(bibtex) : undefined;
        if (!bibtex || !sourceKey) {
          return { ok: false, reason: 'malformed', message: `Semantic Scholar has no BibTeX for ${paperId}` };
        }

        return {
          ok: true,
          rawEntry: bibtex,
          sourceKey,
          eprint: externalId(paper, 'ArXiv'),
          doi: externalId(paper, 'DOI'),
          via: `Semantic Scholar (${paperId})`
        };
      } catch (error) {
        console.error(`[semantic-scholar] ${key.raw}:`, error instanceof Error ? error.message : error);
        return failureFromError(error);
      }
    }
  };
}
