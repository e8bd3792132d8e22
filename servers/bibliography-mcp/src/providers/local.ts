import {
  extractBibtexFields,
  extractBibtexKey,
  parseBibEntries,
  type CitationKey,
  type FetchOutcome,
  type LocalSource,
  type SourceAdapter
} from '@citefetch/core';

/** A pre-loaded .bib collection; keys are matched verbatim. */
export function createLocalSource(bibContent: string): LocalSource {
  const entries = parseBibEntries(bibContent);
  return {
    lookup: rawKey => entries.get(rawKey),
    has: rawKey => entries.has(rawKey)
  };
}

export function createLocalAdapter(source: LocalSource): SourceAdapter {
  return {
    name: 'local',
    async fetch(key: CitationKey): Promise<FetchOutcome> {
      const entry = source.lookup(key.raw);
      if (!entry) {
        return { ok: false, reason: 'not-found', message: `${key.raw} is not in the local source` };
      }

      const { eprint, doi } = extractBibtexFields(entry, 'eprint', 'doi');
      return {
        ok: true,
        rawEntry: entry,
        sourceKey: extractBibtexKey(entry) ?? key.raw,
        eprint,
        doi,
        via: 'local source'
      };
    }
  };
}
