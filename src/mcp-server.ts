import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { errorMessage } from './errors';
import type { EuvdClient } from './euvd-client';
import { logError, logInfo } from './logger';

export const SERVER_INFO = {
  name: 'EUVD API',
  version: '1.0.0',
} as const;

export const TOOL_NAMES = [
  'get_last_vulnerabilities',
  'get_exploited_vulnerabilities',
  'get_critical_vulnerabilities',
  'search_vulnerabilities',
  'get_vulnerability_by_id',
  'get_advisory_by_id',
] as const;

function jsonResult(value: unknown): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
  };
}

function errorResult(tool: string, error: unknown): CallToolResult {
  logError(`Error in ${tool}: ${errorMessage(error)}`);
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(
          {
            error: errorMessage(error),
            type: error instanceof Error ? error.name : 'Error',
          },
          null,
          2,
        ),
      },
    ],
    isError: true,
  };
}

async function run(tool: string, call: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    logInfo(`Calling ${tool}`);
    return jsonResult(await call());
  } catch (error) {
    return errorResult(tool, error);
  }
}

const searchShape = {
  from_score: z.number().nullish().describe('Minimum CVSS score (0-10)'),
  to_score: z.number().nullish().describe('Maximum CVSS score (0-10)'),
  from_epss: z.number().nullish().describe('Minimum EPSS score (0-100)'),
  to_epss: z.number().nullish().describe('Maximum EPSS score (0-100)'),
  from_date: z.string().nullish().describe('Start date in YYYY-MM-DD format'),
  to_date: z.string().nullish().describe('End date in YYYY-MM-DD format'),
  from_updated_date: z.string().nullish().describe('Start updated date in YYYY-MM-DD format'),
  to_updated_date: z.string().nullish().describe('End updated date in YYYY-MM-DD format'),
  product: z.string().nullish().describe("Product name filter (e.g., 'Windows')"),
  vendor: z.string().nullish().describe("Vendor name filter (e.g., 'Microsoft')"),
  assigner: z.string().nullish().describe("Assigner filter (e.g., 'mitre')"),
  exploited: z.boolean().nullish().describe('Filter by exploited status'),
  text: z.string().nullish().describe('Keyword search'),
  page: z.number().int().nullish().describe('Page number (starts at 0)'),
  size: z.number().int().nullish().describe('Page size (default 10, max 100)'),
};

/**
 * Builds an MCP server exposing the EUVD endpoints as tools. Results are
 * returned as pretty-printed JSON text; failures come back with `isError`
 * set and the original error message.
 */
export function createMcpServer(client: EuvdClient): McpServer {
  const server = new McpServer(SERVER_INFO);

  server.tool(
    'get_last_vulnerabilities',
    'Get the latest vulnerabilities from the EUVD database. Returns up to 8 latest vulnerability records.',
    async () => run('get_last_vulnerabilities', () => client.getLastVulnerabilities()),
  );

  server.tool(
    'get_exploited_vulnerabilities',
    'Get the latest exploited vulnerabilities from the EUVD database. Returns up to 8 latest exploited vulnerability records.',
    async () => run('get_exploited_vulnerabilities', () => client.getExploitedVulnerabilities()),
  );

  server.tool(
    'get_critical_vulnerabilities',
    'Get the latest critical vulnerabilities from the EUVD database. Returns up to 8 latest critical vulnerability records.',
    async () => run('get_critical_vulnerabilities', () => client.getCriticalVulnerabilities()),
  );

  server.tool(
    'search_vulnerabilities',
    'Search vulnerabilities with flexible filters: CVSS and EPSS score ranges, publish and update date ranges, product, vendor, assigner, exploited status and keyword. Returns one page of results (up to 100 records per request).',
    searchShape,
    async filters => run('search_vulnerabilities', () => client.searchVulnerabilities(filters)),
  );

  server.tool(
    'get_vulnerability_by_id',
    'Get a specific vulnerability by EUVD ID.',
    {
      enisa_id: z
        .string()
        .min(1)
        .describe("EUVD identifier (e.g., 'EUVD-2025-4893' or 'EUVD-2024-45012')"),
    },
    async ({ enisa_id }) =>
      run('get_vulnerability_by_id', () => client.getVulnerabilityById(enisa_id.trim())),
  );

  server.tool(
    'get_advisory_by_id',
    'Get a specific advisory by ID.',
    {
      advisory_id: z
        .string()
        .min(1)
        .describe("Advisory identifier (e.g., 'oxas-adv-2024-0002' or 'cisco-sa-ata19x-multi-RDTEqRsy')"),
    },
    async ({ advisory_id }) =>
      run('get_advisory_by_id', () => client.getAdvisoryById(advisory_id.trim())),
  );

  return server;
}
