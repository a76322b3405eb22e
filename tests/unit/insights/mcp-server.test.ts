import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, describe, expect, it } from 'vitest';

import { createMcpServer } from '@/modules/insights/shell/server/mcp-server.js';

import { makeSampleContext } from '../../fixtures/dataset.js';
import {
  makeFailingContextProvider,
  makeFakeContextProvider,
  makeSilentLogger,
} from '../../fixtures/fakes.js';

import type { ContextProvider } from '@/modules/dataset/core/ports.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

describe('MCP server', () => {
  let server: McpServer | undefined;
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    await server?.close();
    client = undefined;
    server = undefined;
  });

  const connect = async (
    contextProvider: ContextProvider = makeFakeContextProvider(makeSampleContext())
  ): Promise<Client> => {
    server = createMcpServer({ contextProvider, logger: makeSilentLogger(), version: '1.0.0-test' });
    client = new Client({ name: 'test-client', version: '1.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
    return client;
  };

  it('lists every tool as read-only', async () => {
    const mcp = await connect();

    const { tools } = await mcp.listTools();

    expect(tools).toHaveLength(11);
    const ltv = tools.find((tool) => tool.name === 'get_customer_ltv');
    expect(ltv?.title).toBe('Customer lifetime value');
    expect(ltv?.annotations?.readOnlyHint).toBe(true);
    expect(Object.keys(ltv?.inputSchema.properties ?? {})).toEqual(['top_n', 'region', 'segment']);
  });

  it('returns the envelope as structured content', async () => {
    const mcp = await connect();

    const result = await mcp.callTool({
      name: 'get_return_rates',
      arguments: { category: 'home' },
    });

    expect(result.isError).toBeUndefined();
    expect(result).toMatchObject({
      structuredContent: {
        ok: true,
        tool_used: 'get_return_rates',
        overall_return_rate: 50,
        total_revenue_lost: 20,
      },
    });
  });

  it('flags operation errors', async () => {
    const mcp = await connect();

    const result = await mcp.callTool({
      name: 'get_segment_comparison',
      arguments: { region: 'central' },
    });

    expect(result).toMatchObject({
      isError: true,
      structuredContent: {
        ok: false,
        error_type: 'invalid_input',
        message: 'Invalid region: central',
      },
    });
  });

  it('reports an unavailable dataset as a computation error', async () => {
    const mcp = await connect(makeFailingContextProvider());

    const result = await mcp.callTool({ name: 'get_data_overview', arguments: {} });

    expect(result).toMatchObject({
      isError: true,
      structuredContent: {
        ok: false,
        error_type: 'computation_error',
        message: 'Dataset unavailable: Required data file not found at /missing/transactions.csv',
      },
    });
  });
});
