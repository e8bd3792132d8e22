import {
  arxivIdOf,
  buildUserAgent,
  extractBibtexFields,
  extractBibtexKey,
  failureFromError,
  getJSON,
  getText,
  parseResponse,
  type CitationKey,
  type FetchOutcome,
  type MemoryCache,
  type SourceAdapter
} from '@citefetch/core';
import { z } from 'zod';

const BASE = 'https://inspirehep.net/api';

/** Identifiers INSPIRE knows for one record. */
export interface InspireIds {
  texkey?: string;
  adsBibcode?: string;
  arxivId?: string;
  doi?: string;
}

export interface InspireOptions {
  contactEmail?: string;
  timeoutMs?: number;
  /** Shared with the other adapters so a record's ids are looked up once. */
  idCache?: MemoryCache<InspireIds | null>;
}

const inspireSearchSchema = z.object({
  hits: z.object({
    hits: z.array(z.object({
      metadata: z.object({
        texkeys: z.array(z.string()).optional(),
        external_system_identifiers: z.array(z.object({
          schema: z.string(),
          value: z.string()
        })).optional(),
        arxiv_eprints: z.array(z.object({ value: z.string() })).optional(),
        dois: z.array(z.object({ value: z.string() })).optional()
      })
    }))
  })
});

function searchQuery(key: CitationKey): string | undefined {
  if (key.format === 'inspire') return `texkeys:${key.raw}`;
  const arxivId = arxivIdOf(key);
  return arxivId ? `arxiv:${arxivId}` : undefined;
}

function bibtexUrl(key: CitationKey): string | undefined {
  if (key.format === 'inspire') {
    return `${BASE}/literature?${new URLSearchParams({ q: `texkeys:${key.raw}` })}`;
  }
  const arxivId = arxivIdOf(key);
  // Old-style ids keep their slash: /api/arxiv/hep-ph/9905318
  return arxivId ? `${BASE}/arxiv/${arxivId}` : undefined;
}

export async function getInspireBibtex(key: CitationKey, options: InspireOptions = {}): Promise<string | null> {
  const url = bibtexUrl(key);
  if (!url) return null;

  const { text } = await getText(url, {
    headers: {
      'Accept': 'application/x-bibtex',
      'User-Agent': buildUserAgent(options.contactEmail)
    },
    timeoutMs: options.timeoutMs
  });
  const trimmed = text.trim();
  return trimmed ? trimmed : null;
}

async function fetchInspireIds(key: CitationKey, options: InspireOptions): Promise<InspireIds | null> {
  const q = searchQuery(key);
  if (!q) return null;

  const params = new URLSearchParams({
    q,
    fields: 'texkeys,external_system_identifiers,arxiv_eprints,dois'
  });
  const url = `${BASE}/literature?${params}`;
  const { json } = await getJSON(url, {
    headers: { 'User-Agent': buildUserAgent(options.contactEmail) },
    timeoutMs: options.timeoutMs
  });

  const hit = parseResponse(inspireSearchSchema, json, url).hits.hits[0];
  if (!hit) return null;

  const { metadata } = hit;
  return {
    texkey: metadata.texkeys?.[0],
    adsBibcode: metadata.external_system_identifiers?.find(id => id.schema === 'ADS')?.value,
    arxivId: metadata.arxiv_eprints?.[0]?.value,
    doi: metadata.dois?.[0]?.value
  };
}

/**
 * ADS bibcode, arXiv id and DOI for an INSPIRE texkey or arXiv id.
 * Null when INSPIRE has no such record.
 */
export async function getInspireIds(key: CitationKey, options: InspireOptions = {}): Promise<InspireIds | null> {
  if (!options.idCache) {
    return fetchInspireIds(key, options);
  }
  return options.idCache.getOrLoad(key.raw, () => fetchInspireIds(key, options));
}

export function createInspireAdapter(options: InspireOptions = {}): SourceAdapter {
  return {
    name: 'inspire',
    async fetch(key: CitationKey): Promise<FetchOutcome> {
      if (!bibtexUrl(key)) {
        return { ok: false, reason: 'not-found', message: `INSPIRE cannot look up ${key.format} keys` };
      }

      try {
        const bibtex = await getInspireBibtex(key, options);
        if (!bibtex) {
          return { ok: false, reason: 'not-found', message: `No INSPIRE record for ${key.raw}` };
        }

        const sourceKey = extractBibtexKey(bibtex);
        if (!sourceKey) {
          return { ok: false, reason: 'malformed', message: `INSPIRE returned an entry without a key for ${key.raw}` };
        }

        const { eprint, doi } = extractBibtexFields(bibtex, 'eprint', 'doi');
        return { ok: true, rawEntry: bibtex, sourceKey, eprint, doi, via: 'INSPIRE' };
      } catch (error) {
        console.error(`[inspire] ${key.raw}:`, error instanceof Error ? error.message : error);
        return failureFromError(error);
      }
    }
  };
}
