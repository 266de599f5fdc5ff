import 'dotenv/config';
import { serve } from '@hono/node-server';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createApp } from './app';
import { type Settings, loadSettings } from './config';
import { errorMessage } from './errors';
import { EuvdClient } from './euvd-client';
import { logError, logInfo, setLogLevel } from './logger';
import { SERVER_INFO, createMcpServer } from './mcp-server';

async function startStdio(client: EuvdClient): Promise<void> {
  const server = createMcpServer(client);
  await server.connect(new StdioServerTransport());
  logInfo(`${SERVER_INFO.name} MCP server listening on stdio`);
}

function startHttp(client: EuvdClient, settings: Settings): void {
  const app = createApp(client);
  serve({ fetch: app.fetch, hostname: settings.host, port: settings.port }, info => {
    logInfo(`${SERVER_INFO.name} MCP server listening on http://${settings.host}:${info.port}/mcp`);
  });
}

async function main(): Promise<void> {
  const settings = loadSettings();
  setLogLevel(settings.logLevel);

  const client = EuvdClient.fromSettings(settings);
  logInfo('Using EUVD API', { baseUrl: client.apiBaseUrl, transport: settings.transport });

  if (settings.transport === 'stdio') {
    await startStdio(client);
    return;
  }
  startHttp(client, settings);
}

main().catch((error: unknown) => {
  logError(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
