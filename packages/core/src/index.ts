export * from './types.js';
export * from './errors.js';
export * from './http.js';
export * from './classify.js';
export * from './router.js';
export * from './bibtex.js';
export * from './config.js';
export * from './report.js';
export { DuplicateTracker, fingerprintOf, normalizeDoi, normalizeEprint, type Fingerprint } from './duplicates.js';
export { EntryMerger, type MergeOptions } from './merger.js';
export { Resolver, type ResolverOptions } from './resolver.js';
export { ResolutionEngine, type EngineDependencies } from './engine.js';
export { runWithConcurrency, type WorkItem, type WorkFn, type QueueOptions } from './pool.js';
export { MemoryCache } from './cache/memory.js';
export { startServer, transportFromEnv, type TransportConfig, type TransportKind } from './transport.js';
