import { expandAasMacros, findUsedMacros, makeCrossrefStub, replaceBibtexKey, truncateAuthors } from './bibtex.js';
import { DuplicateTracker } from './duplicates.js';
import type { Disposition, OutputEntrySet, ResolveResult, WrittenStub } from './types.js';

export interface MergeOptions {
  /** Re-resolve and overwrite keys that are already in the output. */
  fullRefresh?: boolean;
  maxAuthors?: number;
  /** Journal macros to expand inline, e.g. `\apj` -> `ApJ`. */
  macros?: Map<string, string>;
}

type Succeeded = Extract<ResolveResult, { status: 'succeeded' }>;

/**
 * Owns the output entry set and the duplicate tracker for one run. Callers
 * go through `contains` and `merge` only, and must call `merge` in input order.
 */
export class EntryMerger {
  private readonly output: OutputEntrySet;
  private readonly preexisting: ReadonlySet<string>;
  private readonly written = new Set<string>();
  private readonly tracker = new DuplicateTracker();

  constructor(existing: OutputEntrySet, private readonly options: MergeOptions = {}) {
    this.output = new Map(existing);
    this.preexisting = new Set(existing.keys());

    if (!options.fullRefresh) {
      for (const [key, text] of existing) {
        this.tracker.seed(key, text);
      }
    }
  }

  /** True when the key was in the output before this run and will be kept. */
  contains(key: string): boolean {
    return !this.options.fullRefresh && this.preexisting.has(key);
  }

  merge(result: Succeeded): Disposition {
    const { entry, finalKey, stub } = result;

    if (this.contains(finalKey)) {
      return { kind: 'skipped-existing', key: finalKey, stub: this.writeStub(stub) };
    }

    const observation = this.tracker.observe(entry, finalKey);
    if (observation.kind === 'duplicate') {
      return {
        kind: 'skipped-duplicate',
        key: entry.citationKey.raw,
        winningKey: observation.existingKey,
        winningSourceKey: observation.existingSourceKey,
        matchedOn: observation.matchedOn
      };
    }

    const text = this.normalize(replaceBibtexKey(entry.rawEntry, finalKey));
    this.output.set(finalKey, text);
    this.written.add(finalKey);
    return { kind: 'accepted', key: finalKey, entry: text, stub: this.writeStub(stub) };
  }

  entries(): OutputEntrySet {
    return new Map(this.output);
  }

  private normalize(text: string): string {
    let normalized = truncateAuthors(text, this.options.maxAuthors);
    if (this.options.macros?.size) {
      const used = findUsedMacros(normalized, this.options.macros);
      if (used.size) {
        normalized = expandAasMacros(normalized, used);
      }
    }
    return normalized;
  }

  private writeStub(stub: Succeeded['stub']): WrittenStub | undefined {
    if (!stub) return undefined;
    if (this.contains(stub.stubKey) || this.written.has(stub.stubKey)) {
      return undefined;
    }
    const entry = makeCrossrefStub(stub.stubKey, stub.targetKey);
    this.output.set(stub.stubKey, entry);
    this.written.add(stub.stubKey);
    return { key: stub.stubKey, entry };
  }
}
