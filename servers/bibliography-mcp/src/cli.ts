#!/usr/bin/env tsx
/**
 * citefetch: fill a .bib with entries for every key cited in .tex files.
 *
 * Usage:
 *   citefetch [paths...] -o refs.bib [options]
 *
 * Exit status: 0 when every key resolved or was already present, 1 when a key
 * could not be resolved or the key-type check failed, 2 for bad options.
 */

import { Command, InvalidArgumentError } from 'commander';
import {
  ConfigError,
  KeyTypeMismatchError,
  exitCodeFor,
  formatReport,
  rateLimitedKeys,
  retryAfterSeconds
} from '@citefetch/core';
import { loadSettings, DEFAULT_CONFIG_FILE } from './settings.js';
import { updateBibliography } from './workflow.js';

interface CliOptions {
  readonly output: string;
  readonly source?: string;
  readonly adsApiKey?: string;
  readonly s2ApiKey?: string;
  readonly localBib?: string;
  readonly preferRemote?: boolean;
  readonly maxAuthors?: number;
  readonly keyType?: string;
  readonly fullRefresh?: boolean;
  readonly concurrency?: number;
  readonly timeout?: number;
  readonly aasMacros?: string;
  readonly config?: string;
  readonly dryRun?: boolean;
  readonly verbose?: boolean;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function buildProgram(): Command {
  return new Command()
    .name('citefetch')
    .description('Fetch BibTeX for the INSPIRE, ADS and arXiv keys cited in LaTeX files')
    .argument('[paths...]', '.tex files or directories to scan', ['.'])
    .requiredOption('-o, --output <file>', 'BibTeX file to update')
    .option('-s, --source <name>', 'preferred source: ads, inspire, semantic-scholar or auto')
    .option('--ads-api-key <key>', 'ADS API token (default: $ADS_API_KEY)')
    .option('--s2-api-key <key>', 'Semantic Scholar API key (default: $SEMANTIC_SCHOLAR_API_KEY)')
    .option('--local-bib <file>', 'take entries for keys found in this .bib verbatim')
    .option('--prefer-remote', 'try remote providers before --local-bib')
    .option('-a, --max-authors <n>', 'truncate longer author lists to "and others"', parseInteger)
    .option('--key-type <type>', 'refuse to run unless every key is inspire, ads-bibcode or arxiv')
    .option('--full-refresh', 're-fetch keys already present in the output')
    .option('-j, --concurrency <n>', 'keys resolved in parallel', parseInteger)
    .option('--timeout <ms>', 'per-request timeout in milliseconds', parseInteger)
    .option('--aas-macros <file>', 'AAS style file whose journal macros are expanded')
    .option('-c, --config <file>', `YAML config file (default: $CITEFETCH_CONFIG or ${DEFAULT_CONFIG_FILE})`)
    .option('-n, --dry-run', 'resolve and report without writing the output')
    .option('-v, --verbose', 'log every provider attempt')
    .action(async (paths: string[], options: CliOptions) => {
      process.exitCode = await execute(paths, options);
    });
}

async function execute(paths: string[], options: CliOptions): Promise<number> {
  try {
    const settings = loadSettings({
      preferredSource: options.source,
      adsApiKey: options.adsApiKey,
      semanticScholarApiKey: options.s2ApiKey,
      preferRemote: options.preferRemote,
      maxAuthors: options.maxAuthors,
      enforceKeyType: options.keyType,
      fullRefresh: options.fullRefresh,
      concurrency: options.concurrency,
      timeoutMs: options.timeout,
      verbose: options.verbose
    }, options.config);

    const result = await updateBibliography({
      texPaths: paths,
      bibPath: options.output,
      localBibPath: options.localBib,
      aasMacrosPath: options.aasMacros,
      dryRun: options.dryRun
    }, settings);

    const summary = formatReport(result.report);
    if (summary) console.error(summary);

    const limited = rateLimitedKeys(result.report);
    if (limited.length > 0) {
      const wait = retryAfterSeconds(result.report);
      const when = wait === undefined ? 'later' : `in ${wait}s`;
      console.error(`Rate limited while resolving: ${limited.join(', ')}. Try again ${when}.`);
    }
    if (result.written) {
      console.error(`Wrote ${result.entries.size} entries to ${options.output}`);
    }
    return exitCodeFor(result.report);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      return 2;
    }
    if (error instanceof KeyTypeMismatchError) {
      console.error(`Error: ${error.message}`);
      console.error('Nothing was fetched.');
      return 1;
    }
    console.error(`[citefetch] ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

buildProgram().parseAsync(process.argv).catch((error: unknown) => {
  console.error('[citefetch] fatal', error);
  process.exit(1);
});
