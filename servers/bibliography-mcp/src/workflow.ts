import { readFile } from 'fs/promises';
import {
  ResolutionEngine,
  parseAasMacros,
  parseBibEntries,
  type LocalSource,
  type ResolutionConfig,
  type ResolutionRun
} from '@citefetch/core';
import { collectTexFiles, readBibFile, serializeEntries, writeBibFile } from './bibfile.js';
import { extractCiteKeys } from './latex.js';
import { buildAdapters, createLocalSource } from './providers/index.js';

export interface BibliographyJob {
  /** .tex files or directories to scan. */
  texPaths: string[];
  /** Output .bib, read first and rewritten at the end. */
  bibPath: string;
  /** A .bib whose entries are used verbatim for keys it contains. */
  localBibPath?: string;
  /** AAS style file whose journal macros get expanded. */
  aasMacrosPath?: string;
  dryRun?: boolean;
}

export interface JobResult extends ResolutionRun {
  texFiles: string[];
  written: boolean;
}

export interface KeysJob {
  keys: string[];
  existingBib?: string;
  localBib?: string;
}

function engineFor(config: ResolutionConfig, localSource?: LocalSource, macros?: Map<string, string>) {
  return new ResolutionEngine(config, {
    adapters: buildAdapters(config, localSource),
    localSource,
    macros
  });
}

/** Scan, resolve, merge and write back one .bib. */
export async function updateBibliography(job: BibliographyJob, config: ResolutionConfig): Promise<JobResult> {
  const texFiles = await collectTexFiles(job.texPaths);
  const rawKeys: string[] = [];
  const scanWarnings: string[] = [];

  for (const file of texFiles) {
    const { keys, warnings } = extractCiteKeys(await readFile(file, 'utf-8'), file);
    rawKeys.push(...keys);
    scanWarnings.push(...warnings);
  }

  const localSource = job.localBibPath
    ? createLocalSource(await readFile(job.localBibPath, 'utf-8'))
    : undefined;
  const macros = job.aasMacrosPath
    ? parseAasMacros(await readFile(job.aasMacrosPath, 'utf-8'))
    : undefined;

  const existing = await readBibFile(job.bibPath);
  const run = await engineFor(config, localSource, macros).run(rawKeys, existing);
  run.report.warnings.unshift(...scanWarnings);

  const changed = run.report.accepted.length > 0 || run.report.stubs.length > 0;
  if (changed && !job.dryRun) {
    await writeBibFile(job.bibPath, run.entries);
  }

  return { ...run, texFiles, written: changed && !job.dryRun };
}

/** Resolve keys against in-memory .bib text; nothing touches disk. */
export async function resolveKeys(job: KeysJob, config: ResolutionConfig): Promise<ResolutionRun & { bibtex: string }> {
  const localSource = job.localBib ? createLocalSource(job.localBib) : undefined;
  const existing = job.existingBib ? parseBibEntries(job.existingBib) : new Map<string, string>();
  const run = await engineFor(config, localSource).run(job.keys, existing);
  return { ...run, bibtex: serializeEntries(run.entries) };
}
