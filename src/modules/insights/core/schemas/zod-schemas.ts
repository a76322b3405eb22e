/**
 * Insights Module - Zod Schemas
 *
 * Input shapes required by the MCP SDK. They mirror the TypeBox schemas in
 * tools.ts; the registry still runs its own checks on every call.
 */

import { z, type ZodRawShape } from 'zod';

import type { ToolName } from '../types.js';

const categoryParam = z
  .string()
  .optional()
  .describe('Product category: clothing, electronics, grocery, home or sports');

const regionParam = z.string().optional().describe('Customer region: east, north, south or west');

export const RevenueByCategoryInputZod = z.object({
  start_date: z.string().optional().describe('Inclusive start date (YYYY-MM-DD)'),
  end_date: z.string().optional().describe('Inclusive end date (YYYY-MM-DD)'),
  categories: z.array(z.string()).optional().describe('Only include these categories'),
});

export const CustomerLtvInputZod = z.object({
  top_n: z.number().int().optional().describe('Number of customers to return (1-50, default 10)'),
  region: regionParam,
  segment: z.string().optional().describe('Customer segment: new, regular or vip'),
});

export const CategoryFilterInputZod = z.object({ category: categoryParam });

export const PaymentMethodInputZod = z.object({ category: categoryParam, region: regionParam });

export const SegmentComparisonInputZod = z.object({ region: regionParam });

export const NoInputZod = z.object({});

/**
 * Input shape per tool, as passed to `McpServer.registerTool`.
 */
export const TOOL_INPUT_SHAPES: Readonly<Record<ToolName, ZodRawShape>> = {
  get_revenue_by_category: RevenueByCategoryInputZod.shape,
  get_customer_ltv: CustomerLtvInputZod.shape,
  get_return_rates: CategoryFilterInputZod.shape,
  compare_regions: NoInputZod.shape,
  get_month_over_month: NoInputZod.shape,
  get_payment_method_analysis: PaymentMethodInputZod.shape,
  get_segment_comparison: SegmentComparisonInputZod.shape,
  get_revenue_trends: CategoryFilterInputZod.shape,
  get_data_overview: NoInputZod.shape,
  get_date_context: NoInputZod.shape,
  explain_capabilities: NoInputZod.shape,
};
