import { isArxivFormat } from './classify.js';
import { failureFromError } from './http.js';
import { route, type RouteOptions } from './router.js';
import type {
  AdapterRegistry,
  CitationKey,
  FailureReason,
  FetchOutcome,
  PreferredSource,
  ProviderAttempt,
  ResolvedEntry,
  ResolveResult,
  ResolverState,
  SourceAdapter,
  StubAssociation
} from './types.js';

export interface ResolverOptions {
  policy: PreferredSource;
  adapters: AdapterRegistry;
  routeOptions?: (key: CitationKey) => RouteOptions;
  onTransition?: (state: ResolverState) => void;
}

/**
 * Drives one key through its provider chain, one request at a time.
 * A failure always moves on to the next provider; nothing is retried.
 */
export class Resolver {
  constructor(private readonly options: ResolverOptions) {}

  async resolve(key: CitationKey): Promise<ResolveResult> {
    this.emit({ state: 'pending', key });
    this.emit({ state: 'routing', key });

    const order = route(this.options.policy, key.format, this.options.routeOptions?.(key));
    const attempts: ProviderAttempt[] = [];
    let lastReason: FailureReason = 'not-found';

    for (const provider of order) {
      this.emit({ state: 'attempting', key, provider });

      const adapter = this.options.adapters[provider];
      const outcome: FetchOutcome = adapter
        ? await attempt(adapter, key)
        : { ok: false, reason: 'not-found', message: `No adapter configured for ${provider}` };

      if (outcome.ok) {
        const entry: ResolvedEntry = {
          citationKey: key,
          provider,
          rawEntry: outcome.rawEntry,
          naturalKey: outcome.sourceKey,
          eprint: outcome.eprint,
          doi: outcome.doi,
          via: outcome.via
        };
        this.emit({ state: 'succeeded', key, provider });
        return { status: 'succeeded', entry, attempts, ...placement(entry) };
      }

      const failed: ProviderAttempt = { provider, reason: outcome.reason, message: outcome.message };
      if (outcome.retryAfterMs !== undefined) {
        failed.retryAfterMs = outcome.retryAfterMs;
      }
      attempts.push(failed);
      lastReason = outcome.reason;
    }

    this.emit({ state: 'exhausted', key, reason: lastReason });
    return { status: 'exhausted', key, reason: lastReason, attempts };
  }

  private emit(state: ResolverState): void {
    this.options.onTransition?.(state);
  }
}

async function attempt(adapter: SourceAdapter, key: CitationKey): Promise<FetchOutcome> {
  try {
    return await adapter.fetch(key);
  } catch (error) {
    return failureFromError(error);
  }
}

/**
 * arXiv keys keep the provider's key and gain a stub under the arXiv id.
 * Every other format is written under the key the document cites.
 */
function placement(entry: ResolvedEntry): { finalKey: string; stub?: StubAssociation } {
  const raw = entry.citationKey.raw;
  if (!isArxivFormat(entry.citationKey.format)) {
    return { finalKey: raw };
  }
  if (entry.naturalKey === raw) {
    return { finalKey: raw };
  }
  return { finalKey: entry.naturalKey, stub: { stubKey: raw, targetKey: entry.naturalKey } };
}
