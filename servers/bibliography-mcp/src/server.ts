#!/usr/bin/env tsx

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { startServer } from '@citefetch/core';

import { resolveKeysTool, resolveKeysSchema } from './tools/resolve_keys.js';
import { classifyKeys, classifyKeysSchema } from './tools/classify_keys.js';
import { explainRouting, explainRoutingSchema } from './tools/explain_routing.js';
import { loadSettings } from './settings.js';

// ADS_API_KEY, SEMANTIC_SCHOLAR_API_KEY, CONTACT_EMAIL and citefetch.yml
const settings = loadSettings();

const server = new McpServer({
  name: 'bibliography-mcp',
  version: '0.1.0'
});

server.tool(
  'bib_resolve_keys',
  resolveKeysSchema.shape,
  async (params) => {
    const result = await resolveKeysTool(resolveKeysSchema.parse(params), settings);
    return result;
  }
);

server.tool(
  'bib_classify_keys',
  classifyKeysSchema.shape,
  async (params) => {
    const result = await classifyKeys(classifyKeysSchema.parse(params));
    return result;
  }
);

server.tool(
  'bib_explain_routing',
  explainRoutingSchema.shape,
  async (params) => {
    const result = await explainRouting(explainRoutingSchema.parse(params), settings.preferredSource);
    return result;
  }
);

server.server.onerror = (error) => console.error('[bibliography-mcp]', error);
process.on('SIGINT', () => {
  server.close()
    .catch((error: unknown) => console.error('[bibliography-mcp] close failed', error))
    .finally(() => process.exit(0));
});

console.error(`ADS API key: ${settings.adsApiKey ? 'set' : 'not set (set ADS_API_KEY to use ADS)'}`);
startServer(server, { serverName: 'bibliography-mcp' }).catch((error) => {
  console.error('[bibliography-mcp] fatal', error);
  process.exit(1);
});
