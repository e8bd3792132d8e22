import { z } from 'zod';
import {
  KeyTypeMismatchError,
  enforcedKeyTypeSchema,
  formatReport,
  mergeConfigLayers,
  parseConfig,
  preferredSourceSchema,
  type ResolutionConfig
} from '@citefetch/core';
import { resolveKeys } from '../workflow.js';

export const resolveKeysSchema = z.object({
  keys: z.array(z.string().min(1)).min(1).max(500)
    .describe('Citation keys as written in \\cite commands (INSPIRE texkeys, ADS bibcodes, arXiv ids)'),
  existingBib: z.string().optional()
    .describe('Current .bib contents; keys already present are not fetched again'),
  localBib: z.string().optional()
    .describe('.bib contents to take entries from verbatim before asking remote providers'),
  source: preferredSourceSchema.optional()
    .describe('Preferred provider: ads (default), inspire, semantic-scholar, or auto (by key format)'),
  maxAuthors: z.number().int().min(0).optional()
    .describe('Truncate author lists longer than this to "... and others"'),
  fullRefresh: z.boolean().optional()
    .describe('Re-fetch keys that are already in existingBib'),
  enforceKeyType: enforcedKeyTypeSchema.optional()
    .describe('Abort without fetching if any key is not of this type')
});

export type ResolveKeysParams = z.infer<typeof resolveKeysSchema>;

export async function resolveKeysTool(params: ResolveKeysParams, baseConfig: ResolutionConfig) {
  const { keys, existingBib, localBib, source, maxAuthors, fullRefresh, enforceKeyType } = params;

  try {
    const config = parseConfig(mergeConfigLayers(
      { ...baseConfig },
      { preferredSource: source, maxAuthors, fullRefresh, enforceKeyType }
    ));
    const { bibtex, report } = await resolveKeys({ keys, existingBib, localBib }, config);

    return {
      content: [{
        type: 'text' as const,
        text: JSON.stringify({
          summary: formatReport(report),
          accepted: report.accepted.map(({ key, provider, via }) => ({ key, provider, via })),
          existing: report.existing,
          duplicatesSkipped: report.duplicatesSkipped,
          failedKeys: report.failedKeys,
          stubs: report.stubs,
          warnings: report.warnings,
          bibtex
        }, null, 2)
      }]
    };
  } catch (error) {
    if (error instanceof KeyTypeMismatchError) {
      return {
        content: [{
          type: 'text' as const,
          text: JSON.stringify({
            error: 'KEY_TYPE_MISMATCH',
            message: error.message,
            enforced: error.enforced,
            offending: error.offending
          }, null, 2)
        }]
      };
    }

    return {
      content: [{
        type: 'text' as const,
        text: `Error resolving keys: ${error instanceof Error ? error.message : 'Unknown error'}`
      }]
    };
  }
}
