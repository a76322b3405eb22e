import { afterEach, describe, it, expect, vi } from 'vitest';

import {
  TOOL_REGISTRY,
  defineTool,
  executeTool,
  listToolDefinitions,
} from '@/modules/insights/core/registry.js';
import { NoInputSchema } from '@/modules/insights/core/schemas/tools.js';
import { TOOL_INPUT_SHAPES } from '@/modules/insights/core/schemas/zod-schemas.js';
import { TOOL_NAMES } from '@/modules/insights/core/types.js';

import { makeSampleContext } from '../../fixtures/dataset.js';

describe('tool registry', () => {
  const context = makeSampleContext();

  it('registers every tool name exactly once', () => {
    expect(TOOL_REGISTRY.map((tool) => tool.name)).toEqual([...TOOL_NAMES]);
  });

  it('keeps the MCP input shapes in step with the schemas', () => {
    for (const tool of TOOL_REGISTRY) {
      expect(Object.keys(TOOL_INPUT_SHAPES[tool.name])).toEqual(tool.parameters);
    }
  });

  it('wraps a success in an envelope', () => {
    const envelope = executeTool(context, 'get_return_rates', { category: 'home' });

    expect(envelope).toMatchObject({
      ok: true,
      tool_used: 'get_return_rates',
      overall_return_rate: 50,
      highest_return_category: 'home',
      total_revenue_lost: 20,
    });
    expect(Object.keys(envelope)).toEqual([
      'ok',
      'tool_used',
      'summary',
      'data',
      'overall_return_rate',
      'highest_return_category',
      'total_revenue_lost',
      'metadata',
    ]);
  });

  it('treats missing parameters as an empty object', () => {
    const envelope = executeTool(context, 'compare_regions', undefined);

    expect(envelope.ok).toBe(true);
  });

  it('wraps an operation error in an envelope', () => {
    expect(executeTool(context, 'get_segment_comparison', { region: 'central' })).toEqual({
      ok: false,
      error_type: 'invalid_input',
      message: 'Invalid region: central',
      suggestions: ['Valid regions are: east, north, south, west'],
    });
  });

  it('rejects unknown tools', () => {
    const envelope = executeTool(context, 'get_weather', {});

    expect(envelope).toEqual({
      ok: false,
      error_type: 'invalid_input',
      message: 'Unknown tool: get_weather',
      suggestions: [`Available tools are: ${TOOL_NAMES.join(', ')}`],
    });
  });

  it('rejects parameters the tool does not take', () => {
    const envelope = executeTool(context, 'get_return_rates', { region: 'north' });

    expect(envelope.ok).toBe(false);
    if (!envelope.ok) {
      expect(envelope.error_type).toBe('invalid_input');
      expect(envelope.message.startsWith('Invalid parameters for get_return_rates: /region')).toBe(
        true
      );
      expect(envelope.suggestions).toEqual([
        'Accepted parameters: category',
        'Use explain_capabilities to see valid options',
      ]);
    }
  });

  it('rejects wrongly typed parameters', () => {
    const envelope = executeTool(context, 'get_customer_ltv', { top_n: 'ten' });

    expect(envelope.ok).toBe(false);
    if (!envelope.ok) {
      expect(envelope.message.startsWith('Invalid parameters for get_customer_ltv: /top_n')).toBe(
        true
      );
    }
  });

  it('explains that parameterless tools take nothing', () => {
    const envelope = executeTool(context, 'get_date_context', { verbose: true });

    expect(envelope.ok).toBe(false);
    if (!envelope.ok) {
      expect(envelope.suggestions[0]).toBe('get_date_context takes no parameters');
    }
  });

  it('turns a thrown fault into a computation error', () => {
    const faulty = defineTool({
      name: 'get_data_overview',
      title: 'Faulty',
      description: 'Throws',
      exampleQuestions: ['?'],
      inputSchema: NoInputSchema,
      run: () => {
        throw new Error('boom');
      },
    });

    expect(faulty.execute(context, {})).toEqual({
      ok: false,
      error_type: 'computation_error',
      message: 'Computation failed: boom',
      suggestions: ['Retry the request; if it keeps failing the dataset may contain unexpected values'],
    });
  });

  it('lists JSON Schema definitions with read-only annotations', () => {
    const definitions = listToolDefinitions();
    const ltv = definitions.find((definition) => definition.name === 'get_customer_ltv');

    expect(definitions).toHaveLength(11);
    expect(ltv?.parameters).toEqual(['top_n', 'region', 'segment']);
    expect(ltv?.inputSchema).toMatchObject({
      type: 'object',
      additionalProperties: false,
      properties: { top_n: { type: 'integer', default: 10 } },
    });
    expect(ltv?.annotations).toEqual({
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: false,
    });
  });
});

describe('tool determinism', () => {
  const context = makeSampleContext();

  afterEach(() => {
    vi.useRealTimers();
  });

  it('gives identical envelopes on repeat calls and after the clock moves', () => {
    const runAll = (): string[] =>
      TOOL_REGISTRY.map((tool) => JSON.stringify(executeTool(context, tool.name, {})));

    const first = runAll();
    const second = runAll();

    vi.useFakeTimers();
    vi.setSystemTime(new Date('2031-07-04T00:00:00Z'));
    const later = runAll();

    expect(second).toEqual(first);
    expect(later).toEqual(first);
    expect(first).toHaveLength(11);
  });
});
