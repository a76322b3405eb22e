/**
 * Insights HTTP routes
 *
 * Endpoints:
 * - GET  /api/v1/tools       - Tool definitions with JSON Schema inputs
 * - POST /api/v1/tools/:name - Run a tool; the body holds its parameters
 */

import { Type, type Static } from '@sinclair/typebox';

import { executeTool, listToolDefinitions } from '../../core/registry.js';

import type { ToolEnvelope } from '../../core/envelope.js';
import type { InsightsErrorKind } from '../../core/errors.js';
import type { ContextProvider } from '../../../dataset/index.js';
import type { FastifyPluginAsync } from 'fastify';

const ToolParamsSchema = Type.Object({
  name: Type.String({ minLength: 1 }),
});

type ToolParams = Static<typeof ToolParamsSchema>;

export const HTTP_STATUS_BY_ERROR: Readonly<Record<InsightsErrorKind, number>> = {
  invalid_input: 400,
  no_data: 404,
  computation_error: 500,
};

export const statusForEnvelope = (envelope: ToolEnvelope): number =>
  envelope.ok ? 200 : HTTP_STATUS_BY_ERROR[envelope.error_type];

export interface InsightsRoutesDeps {
  contextProvider: ContextProvider;
}

/**
 * Factory function to create insights routes with dependencies
 */
export const makeInsightsRoutes = (deps: InsightsRoutesDeps): FastifyPluginAsync => {
  const { contextProvider } = deps;

  return async (fastify) => {
    fastify.get('/api/v1/tools', async (_request, reply) => {
      return reply.status(200).send({ ok: true, tools: listToolDefinitions() });
    });

    fastify.post<{ Params: ToolParams; Body: unknown }>(
      '/api/v1/tools/:name',
      {
        schema: {
          params: ToolParamsSchema,
        },
      },
      async (request, reply) => {
        const context = await contextProvider.get();
        if (context.isErr()) {
          request.log.error({ error: context.error }, 'Dataset unavailable');
          return reply.status(503).send({
            ok: false,
            error: 'DATASET_UNAVAILABLE',
            message: context.error.message,
          });
        }

        const envelope = executeTool(context.value, request.params.name, request.body);
        if (!envelope.ok) {
          request.log.warn(
            { tool: request.params.name, errorType: envelope.error_type },
            'Tool call failed'
          );
        }

        return reply.status(statusForEnvelope(envelope)).send(envelope);
      }
    );
  };
};
