import { z } from 'zod';
import { classifyKey, explainRoute, preferredSourceSchema, type PreferredSource } from '@citefetch/core';

export const explainRoutingSchema = z.object({
  key: z.string().min(1).describe('Citation key to explain routing for'),
  source: preferredSourceSchema.optional().describe('Preferred provider (defaults to the server setting)'),
  inLocalSource: z.boolean().optional().describe('Treat the key as present in a local .bib'),
  preferRemote: z.boolean().optional().describe('Try remote providers before the local .bib')
});

export type ExplainRoutingParams = z.infer<typeof explainRoutingSchema>;

export async function explainRouting(params: ExplainRoutingParams, defaultSource: PreferredSource) {
  const { key, source = defaultSource, inLocalSource = false, preferRemote = false } = params;
  const format = classifyKey(key);
  const { order, reason } = explainRoute(source, format, { inLocalSource, preferRemote });

  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify({
        key,
        format,
        source,
        routing: { order, reason }
      }, null, 2)
    }]
  };
}
