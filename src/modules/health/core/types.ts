import { Type, type Static } from '@sinclair/typebox';

/**
 * Outcome of one readiness check
 */
export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Component under check' }),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number({ description: 'Check latency in milliseconds' })),
  critical: Type.Optional(
    Type.Boolean({ description: 'When false, failure only degrades the service' })
  ),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Process uptime in seconds' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
