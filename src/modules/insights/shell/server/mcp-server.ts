/**
 * MCP Server Factory
 *
 * Exposes every registered analytics tool over the Model Context Protocol.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { toErrorEnvelope, type ErrorEnvelope, type SuccessEnvelope } from '../../core/envelope.js';
import { computationError } from '../../core/errors.js';
import { TOOL_REGISTRY } from '../../core/registry.js';
import { READ_ONLY_ANNOTATIONS } from '../../core/schemas/adapter.js';
import { TOOL_INPUT_SHAPES } from '../../core/schemas/zod-schemas.js';

import type { ContextProvider, DatasetLoadError } from '../../../dataset/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies required to create the MCP server.
 */
export interface CreateMcpServerDeps {
  contextProvider: ContextProvider;
  logger: Logger;
  version?: string | undefined;
}

// ─────────────────────────────────────────────────────────────────────────────
// Server Instructions
// ─────────────────────────────────────────────────────────────────────────────

const SERVER_INSTRUCTIONS = `
# Commerce Insights - E-commerce Analytics

You answer questions about a fixed e-commerce dataset of transactions and customers.
Every number comes from a tool; never estimate figures yourself.

## Time
"Today", "this month" and "last month" refer to the dataset, not the calendar.
Call get_date_context (or get_data_overview) when a question depends on dates.

## Available Tools
- **get_revenue_by_category**: revenue per product category, optional date range and category list
- **get_customer_ltv**: top customers by lifetime value, optional region/segment
- **get_return_rates**: return rate and revenue lost per category
- **compare_regions**: revenue, customers and return rate per region
- **get_month_over_month**: current month against the previous month
- **get_payment_method_analysis**: usage, value and returns per payment method
- **get_segment_comparison**: new, regular and vip customers compared
- **get_revenue_trends**: monthly revenue and the overall trend
- **get_data_overview**: date range, counts and valid filter values
- **get_date_context**: the anchor dates behind every relative period
- **explain_capabilities**: the tool list with example questions

## Responses
Every tool answers with an envelope. On success it has ok: true, a one-line summary,
the figures, and metadata (date range, filters applied, record count, data as of).
On failure it has ok: false, an error_type (invalid_input, no_data or computation_error),
a message and suggestions. Follow the suggestions and retry rather than guessing.

Revenue always excludes returned orders, except "revenue lost to returns".
Money is rounded to 2 decimals, percentages to 1 decimal.
`;

// ─────────────────────────────────────────────────────────────────────────────
// Tool Response Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Builds a successful MCP tool response with structured content */
const okResponse = (envelope: SuccessEnvelope) => ({
  content: [{ type: 'text' as const, text: JSON.stringify(envelope) }],
  structuredContent: envelope,
});

/** Builds an error MCP tool response with structured content */
const errResponse = (envelope: ErrorEnvelope) => ({
  content: [{ type: 'text' as const, text: JSON.stringify(envelope) }],
  structuredContent: envelope,
  isError: true as const,
});

const datasetUnavailable = (error: DatasetLoadError): ErrorEnvelope =>
  toErrorEnvelope(computationError(`Dataset unavailable: ${error.message}`));

// ─────────────────────────────────────────────────────────────────────────────
// Server Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a configured MCP server with all tools registered.
 */
export function createMcpServer(deps: CreateMcpServerDeps): McpServer {
  const log = deps.logger.child({ component: 'McpServer' });

  const server = new McpServer(
    {
      name: 'Commerce Insights MCP Server',
      version: deps.version ?? '0.1.0',
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        tools: {},
      },
    }
  );

  for (const tool of TOOL_REGISTRY) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: TOOL_INPUT_SHAPES[tool.name],
        annotations: { ...READ_ONLY_ANNOTATIONS, title: tool.title },
      },
      async (args) => {
        log.debug({ tool: tool.name, args }, 'Tool call');

        const context = await deps.contextProvider.get();
        if (context.isErr()) {
          log.error({ tool: tool.name, error: context.error }, 'Dataset unavailable');
          return errResponse(datasetUnavailable(context.error));
        }

        const envelope = tool.execute(context.value, args);
        if (!envelope.ok) {
          log.warn(
            { tool: tool.name, errorType: envelope.error_type, message: envelope.message },
            'Tool call failed'
          );
          return errResponse(envelope);
        }

        return okResponse(envelope);
      }
    );
  }

  return server;
}

/**
 * Starts the MCP server on stdin/stdout.
 */
export async function runMcpServerStdio(deps: CreateMcpServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
