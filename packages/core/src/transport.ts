/**
 * Starts an MCP server over stdio (default) or Streamable HTTP.
 *
 * Environment variables:
 *   TRANSPORT: 'stdio' (default) or 'http'
 *   PORT: HTTP port (default: 8005)
 *   HOST: HTTP host (default: '127.0.0.1')
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Request, Response } from 'express';

export type TransportKind = 'stdio' | 'http';

export interface TransportConfig {
  transport?: TransportKind;
  port?: number;
  host?: string;
  /** Used as the log prefix and in /health responses. */
  serverName?: string;
}

export function transportFromEnv(value = process.env.TRANSPORT): TransportKind {
  return value === 'http' ? 'http' : 'stdio';
}

export async function startServer(
  server: McpServer,
  config: TransportConfig = {}
): Promise<void> {
  const transport = config.transport || transportFromEnv();
  const serverName = config.serverName || 'mcp-server';

  if (transport === 'http') {
    await startHttpServer(server, config, serverName);
  } else {
    await startStdioServer(server, serverName);
  }
}

async function startStdioServer(server: McpServer, serverName: string): Promise<void> {
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${serverName} running on stdio`);
}

async function startHttpServer(
  server: McpServer,
  config: TransportConfig,
  serverName: string
): Promise<void> {
  const { StreamableHTTPServerTransport } = await import('@modelcontextprotocol/sdk/server/streamableHttp.js');
  const express = (await import('express')).default;

  const port = config.port || parseInt(process.env.PORT || '8005', 10);
  const host = config.host || process.env.HOST || '127.0.0.1';

  const app = express();
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      server: serverName,
      transport: 'http',
      timestamp: new Date().toISOString()
    });
  });

  app.post('/mcp', async (req: Request, res: Response) => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // stateless
      enableJsonResponse: true
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => console.error(`[${serverName}] close failed`, error));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error(`[${serverName}] request failed`, error);
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  app.listen(port, host, () => {
    console.error(`${serverName} running on http://${host}:${port}`);
    console.error(`  MCP endpoint: http://${host}:${port}/mcp`);
    console.error(`  Health check: http://${host}:${port}/health`);
  });
}
