import { z } from 'zod';
import { classifyKey } from '@citefetch/core';

export const classifyKeysSchema = z.object({
  keys: z.array(z.string()).min(1).max(500).describe('Citation keys to classify')
});

export type ClassifyKeysParams = z.infer<typeof classifyKeysSchema>;

export async function classifyKeys(params: ClassifyKeysParams) {
  const classified = params.keys.map(key => ({ key, format: classifyKey(key) }));

  return {
    content: [{
      type: 'text' as const,
      text: JSON.stringify({ count: classified.length, keys: classified }, null, 2)
    }]
  };
}
