import { Type, type Static } from '@sinclair/typebox';

/**
 * Result of one dependency check
 */
export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Name of the component being checked' }),
  status: Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]),
  message: Type.Optional(Type.String({ description: 'Additional status message' })),
  latencyMs: Type.Optional(Type.Number({ description: 'Check latency in milliseconds' })),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessStatusSchema = Type.Union([Type.Literal('ok'), Type.Literal('unhealthy')]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

/**
 * Readiness response: can the service answer fiscal queries right now?
 */
export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Process uptime in seconds' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
