/**
 * Insights Module - Wire Types
 *
 * Payloads use snake_case field names: they are the contract read by the
 * natural-language layer. Every payload is a type alias (not an interface)
 * so it stays assignable to `Record<string, unknown>`.
 */

import type { Category, PaymentMethod, Region, Segment } from '../../dataset/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Tool Names
// ─────────────────────────────────────────────────────────────────────────────

export const TOOL_NAMES = [
  'get_revenue_by_category',
  'get_customer_ltv',
  'get_return_rates',
  'compare_regions',
  'get_month_over_month',
  'get_payment_method_analysis',
  'get_segment_comparison',
  'get_revenue_trends',
  'get_data_overview',
  'get_date_context',
  'explain_capabilities',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Metadata & Results
// ─────────────────────────────────────────────────────────────────────────────

export type FilterValue = string | number | readonly string[];

export type ToolMetadata = {
  date_range_start: string;
  date_range_end: string;
  filters_applied: Record<string, FilterValue>;
  record_count: number;
  /** The anchor date (max transaction date) */
  data_as_of: string;
};

export type ToolPayload = Record<string, unknown>;

/**
 * What an operation computes; the registry wraps it in an envelope.
 */
export interface ToolResult<P extends ToolPayload> {
  summary: string;
  payload: P;
  metadata: ToolMetadata;
}

// ─────────────────────────────────────────────────────────────────────────────
// 1. get_revenue_by_category
// ─────────────────────────────────────────────────────────────────────────────

export type CategoryRevenue = {
  category: Category;
  total_revenue: number;
  transaction_count: number;
  avg_transaction_value: number;
  percentage_of_total: number;
};

export type RevenueByCategoryPayload = {
  data: CategoryRevenue[];
  total_revenue: number;
  top_category: Category;
};

// ─────────────────────────────────────────────────────────────────────────────
// 2. get_customer_ltv
// ─────────────────────────────────────────────────────────────────────────────

export type CustomerLtv = {
  customer_id: string;
  total_spent: number;
  transaction_count: number;
  avg_transaction_value: number;
  region: Region | null;
  segment: Segment | null;
  rank: number;
};

export type CustomerLtvPayload = {
  data: CustomerLtv[];
  average_ltv: number;
  total_customers_analyzed: number;
};

// ─────────────────────────────────────────────────────────────────────────────
// 3. get_return_rates
// ─────────────────────────────────────────────────────────────────────────────

export type CategoryReturnRate = {
  category: Category;
  total_transactions: number;
  returned_count: number;
  return_rate_percent: number;
  revenue_lost_to_returns: number;
};

export type ReturnRatesPayload = {
  data: CategoryReturnRate[];
  overall_return_rate: number;
  highest_return_category: Category;
  total_revenue_lost: number;
};

// ─────────────────────────────────────────────────────────────────────────────
// 4. compare_regions
// ─────────────────────────────────────────────────────────────────────────────

export type RegionMetrics = {
  region: Region;
  total_revenue: number;
  customer_count: number;
  transaction_count: number;
  avg_transaction_value: number;
  return_rate_percent: number;
};

export type RegionComparisonPayload = {
  data: RegionMetrics[];
  top_region_by_revenue: Region;
  top_region_by_customers: Region;
  lowest_return_rate_region: Region;
};

// ─────────────────────────────────────────────────────────────────────────────
// 5. get_month_over_month
// ─────────────────────────────────────────────────────────────────────────────

export type PeriodMetrics = {
  period_label: 'current_month' | 'previous_month';
  start_date: string;
  end_date: string;
  revenue: number;
  transaction_count: number;
  unique_customers: number;
  avg_transaction_value: number;
};

export type MonthOverMonthTrend = 'growth' | 'decline' | 'stable';

export type MonthOverMonthPayload = {
  current_period: PeriodMetrics;
  previous_period: PeriodMetrics;
  revenue_change_percent: number;
  transaction_change_percent: number;
  trend: MonthOverMonthTrend;
};

// ─────────────────────────────────────────────────────────────────────────────
// 6. get_payment_method_analysis
// ─────────────────────────────────────────────────────────────────────────────

export type PaymentMethodMetrics = {
  payment_method: PaymentMethod;
  transaction_count: number;
  returned_count: number;
  total_revenue: number;
  avg_transaction_value: number;
  percentage_of_transactions: number;
  return_rate_percent: number;
};

export type PaymentMethodPayload = {
  data: PaymentMethodMetrics[];
  total_revenue: number;
  most_popular_method: PaymentMethod;
  highest_avg_value_method: PaymentMethod;
};

// ─────────────────────────────────────────────────────────────────────────────
// 7. get_segment_comparison
// ─────────────────────────────────────────────────────────────────────────────

export type SegmentMetrics = {
  segment: Segment;
  total_revenue: number;
  customer_count: number;
  transaction_count: number;
  avg_transaction_value: number;
  avg_transactions_per_customer: number;
  return_rate_percent: number;
  percentage_of_revenue: number;
};

export type SegmentComparisonPayload = {
  data: SegmentMetrics[];
  top_segment_by_revenue: Segment;
  top_segment_by_avg_value: Segment;
  total_customers: number;
};

// ─────────────────────────────────────────────────────────────────────────────
// 8. get_revenue_trends
// ─────────────────────────────────────────────────────────────────────────────

export type MonthlyRevenue = {
  /** YYYY-MM */
  month: string;
  revenue: number;
  transaction_count: number;
  unique_customers: number;
  avg_transaction_value: number;
};

export type RevenueTrend = 'growing' | 'declining' | 'stable';

export type RevenueTrendsPayload = {
  data: MonthlyRevenue[];
  total_revenue: number;
  best_month: string;
  worst_month: string;
  avg_monthly_revenue: number;
  overall_trend: RevenueTrend;
};

// ─────────────────────────────────────────────────────────────────────────────
// 9-11. Overview, date context, capabilities
// ─────────────────────────────────────────────────────────────────────────────

export type DataOverviewPayload = {
  data_start: string;
  data_end: string;
  transaction_count: number;
  customer_count: number;
  categories: Category[];
  regions: Region[];
  segments: Segment[];
  payment_methods: PaymentMethod[];
};

export type DateContextPayload = {
  data_start: string;
  data_end: string;
  current_month_start: string;
  current_month_end: string;
  prev_month_start: string;
  prev_month_end: string;
};

export type ToolCapability = {
  tool_name: ToolName;
  description: string;
  example_questions: string[];
  parameters: string[];
};

export type CapabilitiesPayload = {
  data: ToolCapability[];
  total_tools: number;
};
