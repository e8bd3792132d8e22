import type { KeyFormat, PreferredSource, ProviderName } from './types.js';

export interface RouteOptions {
  /** The raw key is present in the configured local collection. */
  inLocalSource?: boolean;
  /** Try remote providers before the local collection. */
  preferRemote?: boolean;
}

export interface RouteExplanation {
  order: ProviderName[];
  reason: string;
}

const REMOTE_ORDER: Record<Exclude<PreferredSource, 'auto'>, ProviderName[]> = {
  'ads': ['ads', 'inspire', 'semantic-scholar'],
  'inspire': ['inspire', 'ads', 'semantic-scholar'],
  'semantic-scholar': ['semantic-scholar', 'inspire', 'ads']
};

function remoteOrder(policy: PreferredSource, format: KeyFormat): ProviderName[] {
  if (policy === 'auto') {
    return format === 'ads-bibcode' ? REMOTE_ORDER.ads : REMOTE_ORDER.inspire;
  }
  return REMOTE_ORDER[policy];
}

/** Ordered providers to try for one key. Fresh array on every call. */
export function route(
  policy: PreferredSource,
  format: KeyFormat,
  options: RouteOptions = {}
): ProviderName[] {
  const order = [...remoteOrder(policy, format)];

  if (!options.inLocalSource) {
    return order;
  }

  if (!options.preferRemote) {
    return ['local', ...order];
  }

  // Local-only identifiers have no remote equivalent
  return format === 'unrecognized' ? [...order, 'local'] : order;
}

export function explainRoute(
  policy: PreferredSource,
  format: KeyFormat,
  options: RouteOptions = {}
): RouteExplanation {
  const order = route(policy, format, options);
  const reasons: string[] = [];

  if (policy === 'auto') {
    reasons.push(format === 'ads-bibcode'
      ? 'ADS bibcode detected: ADS prioritized'
      : 'Not an ADS bibcode: INSPIRE prioritized');
  } else {
    reasons.push(`Preferred source ${policy} tried first`);
  }

  if (options.inLocalSource) {
    if (!options.preferRemote) {
      reasons.push('key found in local source: tried before any remote provider');
    } else if (format === 'unrecognized') {
      reasons.push('key found in local source: kept as last fallback for an unrecognized key');
    } else {
      reasons.push('key found in local source but remote providers preferred');
    }
  }

  return { order, reason: reasons.join('; ') };
}
