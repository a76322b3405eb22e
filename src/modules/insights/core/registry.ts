/**
 * Tool Registry
 *
 * The single list of analytics tools. Dispatch, parameter checks, the
 * capability listing, the MCP server and the HTTP routes all read from it,
 * so the exposed tool set cannot drift.
 */

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { fromThrowable, type Result } from 'neverthrow';

import { toErrorEnvelope, toSuccessEnvelope, type ToolEnvelope } from './envelope.js';
import { computationError, invalidInputError, type InsightsError } from './errors.js';
import { createToolDefinition, READ_ONLY_ANNOTATIONS, type ToolDefinition } from './schemas/adapter.js';
import {
  CategoryFilterInputSchema,
  CustomerLtvInputSchema,
  NoInputSchema,
  PaymentMethodInputSchema,
  RevenueByCategoryInputSchema,
  SegmentComparisonInputSchema,
} from './schemas/tools.js';
import { compareRegions } from './usecases/compare-regions.js';
import { explainCapabilities, type CapabilitySource } from './usecases/explain-capabilities.js';
import { getCustomerLtv } from './usecases/get-customer-ltv.js';
import { getDataOverview } from './usecases/get-data-overview.js';
import { getDateContext } from './usecases/get-date-context.js';
import { getMonthOverMonth } from './usecases/get-month-over-month.js';
import { getPaymentMethodAnalysis } from './usecases/get-payment-method-analysis.js';
import { getReturnRates } from './usecases/get-return-rates.js';
import { getRevenueByCategory } from './usecases/get-revenue-by-category.js';
import { getRevenueTrends } from './usecases/get-revenue-trends.js';
import { getSegmentComparison } from './usecases/get-segment-comparison.js';

import type { ToolName, ToolPayload, ToolResult } from './types.js';
import type { InsightsContext } from '../../dataset/index.js';
import type { Static, TObject } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface ToolSpec<S extends TObject, P extends ToolPayload> {
  name: ToolName;
  title: string;
  description: string;
  exampleQuestions: readonly string[];
  inputSchema: S;
  run: (context: InsightsContext, input: Static<S>) => Result<ToolResult<P>, InsightsError>;
}

/**
 * A tool with its generics erased: takes unchecked parameters, returns an
 * envelope.
 */
export interface RegisteredTool extends CapabilitySource {
  readonly inputSchema: TObject;
  execute(context: InsightsContext, params: unknown): ToolEnvelope;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Turns a fault thrown inside an operation into a computation error */
const guarded = fromThrowable(
  (run: () => ToolEnvelope): ToolEnvelope => run(),
  (error) => computationError(`Computation failed: ${errorMessage(error)}`)
);

/**
 * Compiles the input schema and wraps the operation so that it always
 * answers with an envelope.
 */
export const defineTool = <S extends TObject, P extends ToolPayload>(
  spec: ToolSpec<S, P>
): RegisteredTool => {
  const validator = TypeCompiler.Compile(spec.inputSchema);
  const parameters = Object.keys(spec.inputSchema.properties);

  return {
    name: spec.name,
    title: spec.title,
    description: spec.description,
    exampleQuestions: spec.exampleQuestions,
    parameters,
    inputSchema: spec.inputSchema,

    execute(context, params) {
      const input = params ?? {};

      if (!validator.Check(input)) {
        const details = [...validator.Errors(input)].map(
          (error) => `${error.path === '' ? '/' : error.path}: ${error.message}`
        );
        return toErrorEnvelope(
          invalidInputError(`Invalid parameters for ${spec.name}: ${details.join('; ')}`, [
            parameters.length > 0
              ? `Accepted parameters: ${parameters.join(', ')}`
              : `${spec.name} takes no parameters`,
            'Use explain_capabilities to see valid options',
          ])
        );
      }

      const outcome = guarded(() => {
        const result = spec.run(context, input);
        return result.isOk()
          ? toSuccessEnvelope(spec.name, result.value)
          : toErrorEnvelope(result.error);
      });

      return outcome.isOk() ? outcome.value : toErrorEnvelope(outcome.error);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export const TOOL_REGISTRY: readonly RegisteredTool[] = [
  defineTool({
    name: 'get_revenue_by_category',
    title: 'Revenue by category',
    description:
      'Calculate total revenue broken down by product category, optionally within a date range or for selected categories. Returns are excluded.',
    exampleQuestions: [
      'What is our total revenue by category?',
      'How much revenue did electronics generate?',
      'Show me revenue breakdown for Q4',
    ],
    inputSchema: RevenueByCategoryInputSchema,
    run: getRevenueByCategory,
  }),
  defineTool({
    name: 'get_customer_ltv',
    title: 'Customer lifetime value',
    description:
      'Get top customers ranked by lifetime value (total spending), optionally filtered by region or segment.',
    exampleQuestions: [
      'Which customers have the highest lifetime value?',
      'Who are our top 5 VIP customers?',
      'Show me the best customers in the north region',
    ],
    inputSchema: CustomerLtvInputSchema,
    run: getCustomerLtv,
  }),
  defineTool({
    name: 'get_return_rates',
    title: 'Return rates',
    description: 'Calculate return rates and revenue lost to returns by product category.',
    exampleQuestions: [
      "What's the return rate by product category?",
      'Which category has the most returns?',
      'How much revenue are we losing to returns?',
    ],
    inputSchema: CategoryFilterInputSchema,
    run: getReturnRates,
  }),
  defineTool({
    name: 'compare_regions',
    title: 'Regional comparison',
    description: 'Compare business performance across geographic regions.',
    exampleQuestions: [
      'Compare performance across regions',
      'Which region generates the most revenue?',
      'How do our regions compare?',
    ],
    inputSchema: NoInputSchema,
    run: (context) => compareRegions(context),
  }),
  defineTool({
    name: 'get_month_over_month',
    title: 'Month-over-month analysis',
    description:
      'Compare the current month (up to the latest transaction date) with the previous calendar month.',
    exampleQuestions: [
      'How is this month performing compared to last month?',
      'Are we growing or declining?',
      'Month over month comparison',
    ],
    inputSchema: NoInputSchema,
    run: (context) => getMonthOverMonth(context),
  }),
  defineTool({
    name: 'get_payment_method_analysis',
    title: 'Payment method analysis',
    description:
      'Analyze transaction patterns by payment method, optionally for one category or region.',
    exampleQuestions: [
      'What payment methods do customers prefer?',
      'Which payment method has the highest average order value?',
      "What's the return rate by payment method?",
    ],
    inputSchema: PaymentMethodInputSchema,
    run: getPaymentMethodAnalysis,
  }),
  defineTool({
    name: 'get_segment_comparison',
    title: 'Customer segment comparison',
    description:
      'Compare performance across customer segments (new, regular, vip), optionally within one region.',
    exampleQuestions: [
      'How do VIP customers compare to regular customers?',
      'Which customer segment spends the most?',
      "What's the return rate by customer segment?",
    ],
    inputSchema: SegmentComparisonInputSchema,
    run: getSegmentComparison,
  }),
  defineTool({
    name: 'get_revenue_trends',
    title: 'Revenue trends',
    description: 'Show monthly revenue trends over the dataset period, optionally for one category.',
    exampleQuestions: [
      "What's our revenue trend over time?",
      'Which month had the highest sales?',
      'Are we growing or declining overall?',
    ],
    inputSchema: CategoryFilterInputSchema,
    run: getRevenueTrends,
  }),
  defineTool({
    name: 'get_data_overview',
    title: 'Data overview',
    description:
      'Get basic dataset information: date range, record counts and available dimensions.',
    exampleQuestions: [
      'What is the date range of the data?',
      'How many transactions are there?',
      'What categories are available?',
    ],
    inputSchema: NoInputSchema,
    run: (context) => getDataOverview(context),
  }),
  defineTool({
    name: 'get_date_context',
    title: 'Date context',
    description:
      'Get the dates that "today", "this month" and "last month" refer to. They are derived from the latest transaction, not the calendar.',
    exampleQuestions: ['What is the most recent transaction date?', 'Which month counts as "this month"?'],
    inputSchema: NoInputSchema,
    run: (context) => getDateContext(context),
  }),
  defineTool({
    name: 'explain_capabilities',
    title: 'Capability listing',
    description: 'List all available analytics tools and example questions.',
    exampleQuestions: ['What can you help me with?', 'What analyses are available?'],
    inputSchema: NoInputSchema,
    run: (context) => explainCapabilities(context, TOOL_REGISTRY),
  }),
];

const TOOLS_BY_NAME = new Map<string, RegisteredTool>(TOOL_REGISTRY.map((tool) => [tool.name, tool]));

const findTool = (name: string): RegisteredTool | undefined => TOOLS_BY_NAME.get(name);

/**
 * Runs a tool by name. Every outcome, including an unknown name or a fault
 * inside the operation, comes back as an envelope.
 */
export const executeTool = (
  context: InsightsContext,
  name: string,
  params: unknown
): ToolEnvelope => {
  const tool = findTool(name);
  if (tool === undefined) {
    return toErrorEnvelope(
      invalidInputError(`Unknown tool: ${name}`, [
        `Available tools are: ${TOOL_REGISTRY.map((entry) => entry.name).join(', ')}`,
      ])
    );
  }
  return tool.execute(context, params);
};

/**
 * Serializable definitions (JSON Schema inputs) for listing endpoints.
 */
export const listToolDefinitions = (): ToolDefinition[] =>
  TOOL_REGISTRY.map((tool) =>
    createToolDefinition({
      name: tool.name,
      title: tool.title,
      description: tool.description,
      parameters: tool.parameters,
      inputSchema: tool.inputSchema,
      annotations: READ_ONLY_ANNOTATIONS,
    })
  );
