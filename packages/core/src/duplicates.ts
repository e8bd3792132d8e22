import { extractBibtexFields, extractBibtexKey } from './bibtex.js';
import type { FingerprintField, Observation, ResolvedEntry } from './types.js';

export interface Fingerprint {
  naturalKey?: string;
  eprint?: string;
  doi?: string;
}

interface Owner {
  key: string;
  sourceKey: string;
}

const FIELDS: FingerprintField[] = ['naturalKey', 'eprint', 'doi'];

export function normalizeEprint(eprint: string): string {
  return eprint.trim().replace(/^arxiv:/i, '').replace(/v\d+$/, '').toLowerCase();
}

export function normalizeDoi(doi: string): string {
  return doi
    .trim()
    .replace(/^https?:\/\/(?:dx\.)?doi\.org\//i, '')
    .replace(/^doi:/i, '')
    .toLowerCase();
}

function present(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}

export function fingerprintOf(fields: { naturalKey?: string; eprint?: string; doi?: string }): Fingerprint {
  const fingerprint: Fingerprint = {};
  const naturalKey = present(fields.naturalKey?.trim());
  const eprint = fields.eprint ? present(normalizeEprint(fields.eprint)) : undefined;
  const doi = fields.doi ? present(normalizeDoi(fields.doi)) : undefined;
  if (naturalKey) fingerprint.naturalKey = naturalKey;
  if (eprint) fingerprint.eprint = eprint;
  if (doi) fingerprint.doi = doi;
  return fingerprint;
}

/**
 * Remembers every fingerprint field of accepted entries for one run.
 * A new entry sharing any single field with an earlier one is a duplicate of
 * the key that registered that field first.
 */
export class DuplicateTracker {
  private seen: Record<FingerprintField, Map<string, Owner>> = {
    naturalKey: new Map(),
    eprint: new Map(),
    doi: new Map()
  };

  /**
   * The key an entry will be written under counts as a natural key too, so an
   * entry whose source key equals an earlier final key is that paper again.
   */
  observe(entry: ResolvedEntry, finalKey: string): Observation {
    const fingerprint = fingerprintOf(entry);
    const match = this.find(fingerprint) ?? this.find({ naturalKey: finalKey });
    if (match) {
      return match;
    }
    const owner = { key: finalKey, sourceKey: entry.naturalKey };
    this.register(fingerprint, owner);
    this.register({ naturalKey: finalKey }, owner);
    return { kind: 'novel' };
  }

  /** Registers an entry that was already in the output before this run. */
  seed(key: string, entryText: string): void {
    const { eprint, doi } = extractBibtexFields(entryText, 'eprint', 'doi');
    const naturalKey = extractBibtexKey(entryText) ?? key;
    const fingerprint = fingerprintOf({ naturalKey, eprint, doi });
    if (this.find(fingerprint) ?? this.find({ naturalKey: key })) {
      return;
    }
    const owner = { key, sourceKey: naturalKey };
    this.register(fingerprint, owner);
    this.register({ naturalKey: key }, owner);
  }

  private find(fingerprint: Fingerprint): Observation | undefined {
    for (const field of FIELDS) {
      const value = fingerprint[field];
      if (value === undefined) continue;
      const owner = this.seen[field].get(value);
      if (owner) {
        return {
          kind: 'duplicate',
          existingKey: owner.key,
          existingSourceKey: owner.sourceKey,
          matchedOn: field
        };
      }
    }
    return undefined;
  }

  private register(fingerprint: Fingerprint, owner: Owner): void {
    for (const field of FIELDS) {
      const value = fingerprint[field];
      if (value !== undefined) {
        this.seen[field].set(value, owner);
      }
    }
  }
}
