import type { HttpBindings } from '@hono/node-server';
import { RESPONSE_ALREADY_SENT } from '@hono/node-server/utils/response';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { Hono } from 'hono';
import type { ServerResponse } from 'node:http';
import { errorMessage } from './errors';
import type { EuvdClient } from './euvd-client';
import { logError } from './logger';
import { SERVER_INFO, TOOL_NAMES, createMcpServer } from './mcp-server';

export type Bindings = HttpBindings;

function jsonRpcError(code: number, message: string) {
  return {
    jsonrpc: '2.0' as const,
    id: null,
    error: { code, message },
  };
}

export function createApp(client: EuvdClient): Hono<{ Bindings: Bindings }> {
  const app = new Hono<{ Bindings: Bindings }>();

  app.get('/', c =>
    c.html(`
      <!DOCTYPE html>
      <html>
      <head>
        <title>EUVD MCP Server</title>
        <style>
          body { font-family: system-ui; padding: 2rem; max-width: 800px; margin: 0 auto; }
          .status { padding: 1rem; background: #10b981; color: white; border-radius: 0.5rem; margin: 1rem 0; }
          code { background: #f3f4f6; padding: 0.1rem 0.3rem; border-radius: 0.25rem; }
        </style>
      </head>
      <body>
        <h1>EUVD MCP Server</h1>
        <div class="status">Server running</div>
        <p>MCP endpoint: <code>POST /mcp</code> (streamable HTTP)</p>
        <h2>Available Tools</h2>
        <ul>
          ${TOOL_NAMES.map(name => `<li>${name}</li>`).join('\n          ')}
        </ul>
      </body>
      </html>
    `),
  );

  app.get('/health', c =>
    c.json({
      status: 'ok',
      server: SERVER_INFO.name,
      version: SERVER_INFO.version,
      upstream: client.apiBaseUrl,
    }),
  );

  // Stateless: every request gets its own server and transport.
  app.post('/mcp', async c => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (error) {
      return c.json(jsonRpcError(-32700, `Parse error: ${errorMessage(error)}`), 400);
    }

    let outgoing: ServerResponse | undefined;
    try {
      const bindings = c.env;
      outgoing = bindings.outgoing;
      const server = createMcpServer(client);
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

      outgoing.on('close', () => {
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logError(`Failed to close MCP request: ${errorMessage(error)}`);
        });
      });

      await server.connect(transport);
      await transport.handleRequest(bindings.incoming, outgoing, body);
      return RESPONSE_ALREADY_SENT;
    } catch (error) {
      logError(`Failed to handle MCP request: ${errorMessage(error)}`);
      if (outgoing?.headersSent) {
        return RESPONSE_ALREADY_SENT;
      }
      return c.json(jsonRpcError(-32603, `Internal error: ${errorMessage(error)}`), 500);
    }
  });

  app.on(['GET', 'DELETE'], '/mcp', c =>
    c.json(jsonRpcError(-32000, 'Method not allowed.'), 405),
  );

  return app;
}
