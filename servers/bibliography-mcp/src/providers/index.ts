import { MemoryCache, type AdapterRegistry, type LocalSource, type ResolutionConfig } from '@citefetch/core';
import { createAdsAdapter } from './ads.js';
import { createInspireAdapter, type InspireIds } from './inspire.js';
import { createLocalAdapter } from './local.js';
import { createSemanticScholarAdapter } from './semanticscholar.js';

export { createLocalSource } from './local.js';

/** One adapter per provider, sharing a single INSPIRE id cache for the run. */
export function buildAdapters(config: ResolutionConfig, localSource?: LocalSource): AdapterRegistry {
  const shared = {
    contactEmail: config.contactEmail,
    timeoutMs: config.timeoutMs,
    idCache: new MemoryCache<InspireIds | null>()
  };

  const adapters: AdapterRegistry = {
    'inspire': createInspireAdapter(shared),
    'ads': createAdsAdapter({ ...shared, apiKey: config.adsApiKey }),
    'semantic-scholar': createSemanticScholarAdapter({ ...shared, apiKey: config.semanticScholarApiKey })
  };

  if (localSource) {
    adapters.local = createLocalAdapter(localSource);
  }

  return adapters;
}
