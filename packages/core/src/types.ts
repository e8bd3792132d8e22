export type KeyFormat =
  | 'inspire'
  | 'ads-bibcode'
  | 'arxiv-new'
  | 'arxiv-old'
  | 'unrecognized';

export type ProviderName =
  | 'inspire'
  | 'ads'
  | 'semantic-scholar'
  | 'local';

export type PreferredSource = 'ads' | 'inspire' | 'semantic-scholar' | 'auto';

export type FailureReason =
  | 'not-found'
  | 'rate-limited'
  | 'auth-required'
  | 'transport'
  | 'malformed';

export interface CitationKey {
  readonly raw: string;
  readonly format: KeyFormat;
}

export interface FetchSuccess {
  ok: true;
  rawEntry: string;
  /** Citation key used by the provider's own record. */
  sourceKey: string;
  eprint?: string;
  doi?: string;
  /** How the record was reached, e.g. "ADS via INSPIRE (2016PhRvL.116f1102A)". */
  via?: string;
}

export interface FetchFailure {
  ok: false;
  reason: FailureReason;
  message?: string;
  retryAfterMs?: number;
}

export type FetchOutcome = FetchSuccess | FetchFailure;

export interface SourceAdapter {
  readonly name: ProviderName;
  fetch(key: CitationKey): Promise<FetchOutcome>;
}

export type AdapterRegistry = Partial<Record<ProviderName, SourceAdapter>>;

export interface ResolvedEntry {
  citationKey: CitationKey;
  provider: ProviderName;
  rawEntry: string;
  naturalKey: string;
  eprint?: string;
  doi?: string;
  via?: string;
}

export interface StubAssociation {
  stubKey: string;
  targetKey: string;
}

export interface ProviderAttempt {
  provider: ProviderName;
  reason: FailureReason;
  message?: string;
  retryAfterMs?: number;
}

export type ResolverState =
  | { state: 'pending'; key: CitationKey }
  | { state: 'routing'; key: CitationKey }
  | { state: 'attempting'; key: CitationKey; provider: ProviderName }
  | { state: 'succeeded'; key: CitationKey; provider: ProviderName }
  | { state: 'exhausted'; key: CitationKey; reason: FailureReason };

export type ResolveResult =
  | {
      status: 'succeeded';
      entry: ResolvedEntry;
      /** Key the entry is written under after rewrite/stub rules. */
      finalKey: string;
      stub?: StubAssociation;
      attempts: ProviderAttempt[];
    }
  | {
      status: 'exhausted';
      key: CitationKey;
      reason: FailureReason;
      attempts: ProviderAttempt[];
    };

/** Final citation key -> BibTeX entry text. */
export type OutputEntrySet = Map<string, string>;

export interface LocalSource {
  lookup(rawKey: string): string | undefined;
  has(rawKey: string): boolean;
}

export type FingerprintField = 'naturalKey' | 'eprint' | 'doi';

export type Observation =
  | { kind: 'novel' }
  | {
      kind: 'duplicate';
      existingKey: string;
      existingSourceKey: string;
      matchedOn: FingerprintField;
    };

export interface WrittenStub {
  key: string;
  entry: string;
}

export type Disposition =
  | { kind: 'accepted'; key: string; entry: string; stub?: WrittenStub }
  | { kind: 'skipped-existing'; key: string; stub?: WrittenStub }
  | {
      kind: 'skipped-duplicate';
      key: string;
      winningKey: string;
      winningSourceKey: string;
      matchedOn: FingerprintField;
    };

export interface AcceptedEntry {
  key: string;
  entry: string;
  provider: ProviderName;
  via?: string;
}

export interface DuplicateRecord {
  duplicateKey: string;
  winningKey: string;
  winningSourceKey: string;
  matchedOn: FingerprintField;
}

export interface FailedKey {
  key: string;
  reason: FailureReason;
  attempts: ProviderAttempt[];
}

export interface ResolutionReport {
  accepted: AcceptedEntry[];
  existing: string[];
  duplicatesSkipped: DuplicateRecord[];
  failedKeys: FailedKey[];
  /** arXiv ids written as crossref stubs pointing at their full entry. */
  stubs: StubAssociation[];
  warnings: string[];
}

export interface ResolutionRun {
  entries: OutputEntrySet;
  report: ResolutionReport;
}
