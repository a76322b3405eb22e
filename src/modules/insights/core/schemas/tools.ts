/**
 * Insights Module - Tool Input Schemas
 *
 * TypeBox schemas for each tool's input. They drive parameter checks in the
 * registry, the parameter list in `explain_capabilities` and the JSON Schema
 * served over HTTP.
 *
 * Vocabulary parameters are plain strings: membership is checked by the
 * operations so the error can list the valid values.
 */

import { Type, type Static } from '@sinclair/typebox';

const DateParam = (description: string, example: string) =>
  Type.Optional(Type.String({ description, examples: [example] }));

const CategoryParam = Type.Optional(
  Type.String({
    description: 'Product category: clothing, electronics, grocery, home or sports',
    examples: ['electronics'],
  })
);

const RegionParam = Type.Optional(
  Type.String({
    description: 'Customer region: east, north, south or west',
    examples: ['north'],
  })
);

// ─────────────────────────────────────────────────────────────────────────────
// Parameterless tools
// ─────────────────────────────────────────────────────────────────────────────

export const NoInputSchema = Type.Object({}, { additionalProperties: false });


// ─────────────────────────────────────────────────────────────────────────────
// 1. get_revenue_by_category
// ─────────────────────────────────────────────────────────────────────────────

export const RevenueByCategoryInputSchema = Type.Object(
  {
    start_date: DateParam('Inclusive start date (YYYY-MM-DD)', '2024-01-01'),
    end_date: DateParam('Inclusive end date (YYYY-MM-DD)', '2024-12-31'),
    categories: Type.Optional(
      Type.Array(Type.String(), {
        description: 'Only include these categories',
        examples: [['electronics', 'home']],
      })
    ),
  },
  { additionalProperties: false }
);

export type RevenueByCategoryInput = Static<typeof RevenueByCategoryInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// 2. get_customer_ltv
// ─────────────────────────────────────────────────────────────────────────────

export const CustomerLtvInputSchema = Type.Object(
  {
    top_n: Type.Optional(
      Type.Integer({ description: 'Number of customers to return (1-50)', default: 10 })
    ),
    region: RegionParam,
    segment: Type.Optional(
      Type.String({ description: 'Customer segment: new, regular or vip', examples: ['vip'] })
    ),
  },
  { additionalProperties: false }
);

export type CustomerLtvInput = Static<typeof CustomerLtvInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// 3. get_return_rates / 8. get_revenue_trends
// ─────────────────────────────────────────────────────────────────────────────

export const CategoryFilterInputSchema = Type.Object(
  { category: CategoryParam },
  { additionalProperties: false }
);

export type CategoryFilterInput = Static<typeof CategoryFilterInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// 6. get_payment_method_analysis
// ─────────────────────────────────────────────────────────────────────────────

export const PaymentMethodInputSchema = Type.Object(
  { category: CategoryParam, region: RegionParam },
  { additionalProperties: false }
);

export type PaymentMethodInput = Static<typeof PaymentMethodInputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// 7. get_segment_comparison
// ─────────────────────────────────────────────────────────────────────────────

export const SegmentComparisonInputSchema = Type.Object(
  { region: RegionParam },
  { additionalProperties: false }
);

export type SegmentComparisonInput = Static<typeof SegmentComparisonInputSchema>;
