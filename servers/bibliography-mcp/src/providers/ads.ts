import {
  arxivIdOf,
  buildUserAgent,
  extractBibtexFields,
  extractBibtexKey,
  failureFromError,
  getJSON,
  parseResponse,
  postJSON,
  type CitationKey,
  type FetchOutcome,
  type SourceAdapter
} from '@citefetch/core';
import { z } from 'zod';
import { getInspireIds, type InspireOptions } from './inspire.js';

const BASE = 'https://api.adsabs.harvard.edu/v1';

export interface AdsOptions extends InspireOptions {
  apiKey?: string;
}

const exportSchema = z.object({ export: z.string() });

const searchSchema = z.object({
  response: z.object({
    docs: z.array(z.object({ bibcode: z.string() }))
  })
});

function authHeaders(apiKey: string, contactEmail?: string): Record<string, string> {
  return {
    'Authorization': `Bearer ${apiKey}`,
    'User-Agent': buildUserAgent(contactEmail)
  };
}

export async function getAdsBibtex(bibcode: string, apiKey: string, options: AdsOptions = {}): Promise<string | null> {
  const url = `${BASE}/export/bibtex`;
  const { json } = await postJSON(url, { bibcode: [bibcode] }, {
    headers: authHeaders(apiKey, options.contactEmail),
    timeoutMs: options.timeoutMs
  });

  const exported = parseResponse(exportSchema, json, url).export.trim();
  if (!exported || exported.startsWith('No records')) {
    return null;
  }
  return exported;
}

export async function searchAdsByArxiv(arxivId: string, apiKey: string, options: AdsOptions = {}): Promise<string | null> {
  const params = new URLSearchParams({ q: `arXiv:${arxivId}`, fl: 'bibcode' });
  const url = `${BASE}/search/query?${params}`;
  const { json } = await getJSON(url, {
    headers: authHeaders(apiKey, options.contactEmail),
    timeoutMs: options.timeoutMs
  });

  return parseResponse(searchSchema, json, url).response.docs[0]?.bibcode ?? null;
}

interface Located {
  bibcode: string;
  via: string;
}

/** Finds the ADS bibcode for a key, going through INSPIRE for texkeys. */
async function locate(key: CitationKey, apiKey: string, options: AdsOptions): Promise<Located | null> {
  if (key.format === 'ads-bibcode') {
    return { bibcode: key.raw, via: 'ADS (direct)' };
  }

  const arxivId = arxivIdOf(key);
  if (arxivId) {
    const bibcode = await searchAdsByArxiv(arxivId, apiKey, options);
    return bibcode ? { bibcode, via: `ADS via arXiv (${arxivId})` } : null;
  }

  if (key.format === 'inspire') {
    const ids = await getInspireIds(key, options);
    if (ids?.adsBibcode) {
      return { bibcode: ids.adsBibcode, via: `ADS via INSPIRE (${ids.adsBibcode})` };
    }
    if (ids?.arxivId) {
      const bibcode = await searchAdsByArxiv(ids.arxivId, apiKey, options);
      return bibcode ? { bibcode, via: `ADS via arXiv (${ids.arxivId})` } : null;
    }
  }

  return null;
}

export function createAdsAdapter(options: AdsOptions = {}): SourceAdapter {
  return {
    name: 'ads',
    async fetch(key: CitationKey): Promise<FetchOutcome> {
      const { apiKey } = options;
      if (!apiKey) {
        return { ok: false, reason: 'auth-required', message: 'ADS API key not set (use --ads-api-key or ADS_API_KEY)' };
      }
      if (key.format === 'unrecognized') {
        return { ok: false, reason: 'not-found', message: 'ADS cannot look up unrecognized keys' };
      }

      try {
        const located = await locate(key, apiKey, options);
        if (!located) {
          return { ok: false, reason: 'not-found', message: `No ADS bibcode found for ${key.raw}` };
        }

        const bibtex = await getAdsBibtex(located.bibcode, apiKey, options);
        if (!bibtex) {
          return { ok: false, reason: 'not-found', message: `ADS has no record for ${located.bibcode}` };
        }

        const sourceKey = extractBibtexKey(bibtex);
        if (!sourceKey) {
          return { ok: false, reason: 'malformed', message: `ADS returned an entry without a key for ${located.bibcode}` };
        }

        const { eprint, doi } = extractBibtexFields(bibtex, 'eprint', 'doi');
        return { ok: true, rawEntry: bibtex, sourceKey, eprint, doi, via: located.via };
      } catch (error) {
        console.error(`[ads] ${key.raw}:`, error instanceof Error ? error.message : error);
        return failureFromError(error);
      }
    }
  };
}
