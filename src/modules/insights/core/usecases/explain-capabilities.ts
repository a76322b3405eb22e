import { ok, type Result } from 'neverthrow';

import { buildMetadata } from '../envelope.js';

import type { InsightsContext } from '../../../dataset/index.js';
import type { CapabilitiesPayload, ToolName, ToolResult } from '../types.js';

/**
 * What `explain_capabilities` needs to know about each registered tool.
 */
export interface CapabilitySource {
  readonly name: ToolName;
  readonly title: string;
  readonly description: string;
  readonly exampleQuestions: readonly string[];
  readonly parameters: readonly string[];
}

/**
 * Lists the registered tools. Cannot fail.
 */
export function explainCapabilities(
  context: InsightsContext,
  tools: readonly CapabilitySource[]
): Result<ToolResult<CapabilitiesPayload>, never> {
  const data = tools.map((tool) => ({
    tool_name: tool.name,
    description: tool.description,
    example_questions: [...tool.exampleQuestions],
    parameters: [...tool.parameters],
  }));

  const topics = tools
    .filter((tool) => tool.name !== 'explain_capabilities')
    .map((tool) => tool.title.toLowerCase());

  return ok({
    summary: `I have ${String(data.length)} analytics tools available: ${topics.join(', ')}.`,
    payload: {
      data,
      total_tools: data.length,
    },
    metadata: buildMetadata(context.anchor, { recordCount: 0 }),
  });
}
