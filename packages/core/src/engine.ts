import { isArxivFormat, toCitationKey } from './classify.js';
import type { EnforcedKeyType, ResolutionConfig } from './config.js';
import { KeyTypeMismatchError } from './errors.js';
import { EntryMerger } from './merger.js';
import { runWithConcurrency } from './pool.js';
import { Resolver } from './resolver.js';
import type {
  AdapterRegistry,
  CitationKey,
  KeyFormat,
  LocalSource,
  OutputEntrySet,
  ResolutionReport,
  ResolutionRun,
  ResolveResult,
  ResolverState
} from './types.js';

export interface EngineDependencies {
  adapters: AdapterRegistry;
  localSource?: LocalSource;
  /** Journal macros expanded in accepted entries. */
  macros?: Map<string, string>;
}

function matchesEnforced(format: KeyFormat, enforced: EnforcedKeyType): boolean {
  return enforced === 'arxiv' ? isArxivFormat(format) : format === enforced;
}

function describeTransition(state: ResolverState): string {
  switch (state.state) {
    case 'attempting':
      return `${state.key.raw}: trying ${state.provider}`;
    case 'succeeded':
      return `${state.key.raw}: resolved via ${state.provider}`;
    case 'exhausted':
      return `${state.key.raw}: all providers failed (${state.reason})`;
    default:
      return `${state.key.raw}: ${state.state}`;
  }
}

/**
 * Resolves a set of citation keys against the configured providers and merges
 * them into an existing entry set. Keys are fetched concurrently but merged
 * strictly in first-appearance order, so the earlier key of two that turn out
 * to be the same paper always wins.
 */
export class ResolutionEngine {
  constructor(
    private readonly config: ResolutionConfig,
    private readonly deps: EngineDependencies
  ) {}

  /** Unique keys in first-appearance order, with a warning for each empty one. */
  prepareKeys(rawKeys: readonly string[]): { keys: CitationKey[]; warnings: string[] } {
    const seen = new Set<string>();
    const keys: CitationKey[] = [];
    const warnings: string[] = [];

    for (const raw of rawKeys) {
      if (!raw) {
        warnings.push('Empty citation key found');
        continue;
      }
      if (seen.has(raw)) continue;
      seen.add(raw);
      keys.push(toCitationKey(raw));
    }

    return { keys, warnings };
  }

  /**
   * Throws KeyTypeMismatchError when enforcement is configured and any key
   * outside the local source has another format.
   */
  checkKeyTypes(keys: readonly CitationKey[]): void {
    const enforced = this.config.enforceKeyType;
    if (!enforced) return;

    const offending = keys.filter(key =>
      !this.deps.localSource?.has(key.raw) && !matchesEnforced(key.format, enforced)
    );
    if (offending.length > 0) {
      throw new KeyTypeMismatchError(enforced, offending);
    }
  }

  async run(rawKeys: readonly string[], existing: OutputEntrySet = new Map()): Promise<ResolutionRun> {
    const { keys, warnings } = this.prepareKeys(rawKeys);

    // Must happen before the first request goes out
    this.checkKeyTypes(keys);

    const merger = new EntryMerger(existing, {
      fullRefresh: this.config.fullRefresh,
      maxAuthors: this.config.maxAuthors,
      macros: this.deps.macros
    });

    const report: ResolutionReport = {
      accepted: [],
      existing: [],
      duplicatesSkipped: [],
      failedKeys: [],
      stubs: [],
      warnings
    };

    // Existing keys found before and after fetching, by input position
    const existingFound: { key: string; position: number }[] = [];
    const pending: CitationKey[] = [];
    const pendingPositions: number[] = [];
    keys.forEach((key, position) => {
      if (merger.contains(key.raw)) {
        existingFound.push({ key: key.raw, position });
      } else {
        pending.push(key);
        pendingPositions.push(position);
      }
    });

    const resolver = this.createResolver();
    const results: (ResolveResult | undefined)[] = Array.from({ length: pending.length }, () => undefined);
    let nextToCommit = 0;

    const commitReady = () => {
      while (nextToCommit < results.length) {
        const result = results[nextToCommit];
        if (!result) return;
        const existingKey = this.commit(result, merger, report);
        if (existingKey !== undefined) {
          existingFound.push({ key: existingKey, position: pendingPositions[nextToCommit] ?? keys.length });
        }
        nextToCommit++;
      }
    };

    await runWithConcurrency(pending, async ({ value, index }) => {
      results[index] = await resolver.resolve(value);
      commitReady();
    }, { concurrency: this.config.concurrency });

    report.existing = existingFound
      .sort((a, b) => a.position - b.position)
      .map(item => item.key);
    return { entries: merger.entries(), report };
  }

  private createResolver(): Resolver {
    const { localSource } = this.deps;
    const verbose = this.config.verbose;

    return new Resolver({
      policy: this.config.preferredSource,
      adapters: this.deps.adapters,
      routeOptions: key => ({
        inLocalSource: localSource?.has(key.raw) ?? false,
        preferRemote: this.config.preferRemote
      }),
      onTransition: verbose
        ? state => console.error('[citefetch]', describeTransition(state))
        : undefined
    });
  }

  /** Returns the final key when the entry was already in the output. */
  private commit(result: ResolveResult, merger: EntryMerger, report: ResolutionReport): string | undefined {
    if (result.status === 'exhausted') {
      report.failedKeys.push({ key: result.key.raw, reason: result.reason, attempts: result.attempts });
      return undefined;
    }

    const disposition = merger.merge(result);
    let existingKey: string | undefined;
    switch (disposition.kind) {
      case 'accepted':
        report.accepted.push({
          key: disposition.key,
          entry: disposition.entry,
          provider: result.entry.provider,
          via: result.entry.via
        });
        break;
      case 'skipped-existing':
        existingKey = disposition.key;
        break;
      case 'skipped-duplicate':
        report.duplicatesSkipped.push({
          duplicateKey: disposition.key,
          winningKey: disposition.winningKey,
          winningSourceKey: disposition.winningSourceKey,
          matchedOn: disposition.matchedOn
        });
        return undefined;
    }

    if (disposition.stub && result.stub) {
      report.stubs.push(result.stub);
    }
    return existingKey;
  }
}
