import { existsSync, readFileSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_TIMEOUT_MS } from './http.js';

export const preferredSourceSchema = z.enum(['ads', 'inspire', 'semantic-scholar', 'auto']);

export const enforcedKeyTypeSchema = z.enum(['inspire', 'ads-bibcode', 'arxiv']);

export const resolutionConfigSchema = z.object({
  preferredSource: preferredSourceSchema.default('ads'),
  concurrency: z.number().int().min(1).max(16).default(4),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  fullRefresh: z.boolean().default(false),
  preferRemote: z.boolean().default(false),
  maxAuthors: z.number().int().min(0).optional(),
  enforceKeyType: enforcedKeyTypeSchema.optional(),
  adsApiKey: z.string().min(1).optional(),
  semanticScholarApiKey: z.string().min(1).optional(),
  contactEmail: z.string().email().optional(),
  verbose: z.boolean().default(false)
}).strict();

export type ResolutionConfigInput = z.input<typeof resolutionConfigSchema>;
export type ResolutionConfig = Readonly<z.infer<typeof resolutionConfigSchema>>;
export type EnforcedKeyType = z.infer<typeof enforcedKeyTypeSchema>;

export function parseConfig(input: unknown): ResolutionConfig {
  const parsed = resolutionConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return Object.freeze(parsed.data);
}

/** Missing file reads as an empty document. */
export function loadConfigYaml(filePath: string): Record<string, unknown> {
  if (!existsSync(filePath)) {
    return {};
  }

  let document: unknown;
  try {
    document = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to read config file ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
  }

  if (document === null || document === undefined) {
    return {};
  }
  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`);
  }
  return { ...document };
}

/** Later layers win; keys set to undefined do not override earlier layers. */
export function mergeConfigLayers(...layers: Record<string, unknown>[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }
  return merged;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  return {
    adsApiKey: env.ADS_API_KEY || undefined,
    semanticScholarApiKey: env.SEMANTIC_SCHOLAR_API_KEY || undefined,
    contactEmail: env.CONTACT_EMAIL || undefined,
    verbose: env.CITEFETCH_DEBUG === '1' ? true : undefined
  };
}
