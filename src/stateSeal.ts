import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import type { SessionState } from './types.js';

const scalar = z.union([z.string(), z.number(), z.boolean()]);

const ParameterSetSchema = z.strictObject({
  grid: z.string(),
  monitored_bus: z.number(),
  base_power: z.number(),
  step_size: z.number(),
  max_scale: z.number(),
  power_factor: z.number(),
  voltage_limit: z.number(),
  load_type: z.string(),
  continuation: z.boolean()
});

const SimulationSchema = z.strictObject({
  id: z.string(),
  timestamp: z.string(),
  parameters: ParameterSetSchema,
  points: z.array(z.strictObject({ power: z.number(), voltage: z.number() })),
  criticalVoltage: z.number(),
  maxPower: z.number(),
  noseIndex: z.number().int(),
  convergedSteps: z.number().int(),
  stoppedBy: z.enum(['nose', 'voltage_limit', 'max_scale'])
});

const TurnSchema = z.strictObject({
  id: z.string(),
  index: z.number().int().min(0),
  role: z.enum(['user', 'assistant']),
  kind: z.enum(['question', 'parameter', 'generation', 'analysis', 'error']),
  text: z.string(),
  responseText: z.string(),
  timestamp: z.string(),
  outcome: z.enum(['ok', 'failed']),
  chainDepth: z.number().int().min(0),
  classification: z.strictObject({
    label: z.enum(['question', 'parameter', 'generation', 'analysis', 'unclassifiable']),
    confidence: z.number().nullable(),
    fallback: z.boolean()
  }).optional(),
  parameterChanges: z.array(z.strictObject({ name: z.string(), previous: scalar, next: scalar })).optional(),
  simulation: SimulationSchema.optional(),
  error: z.strictObject({ code: z.string(), message: z.string() }).optional()
});

const StateSchema = z.strictObject({
  sessionId: z.string().min(1),
  parameters: ParameterSetSchema,
  parameterVersion: z.number().int().min(0),
  log: z.array(TurnSchema),
  lastSimulation: SimulationSchema.nullable(),
  contextSummary: z.string(),
  seal: z.string()
});

export type UnsealedState = Omit<SessionState, 'seal'>;

// Sorted keys, undefined members dropped: the seal must not depend on property order.
function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, canonical(v)])
    );
  }
  return value;
}

export function computeSeal(state: UnsealedState | z.infer<typeof StateSchema>, secret: string): string {
  const unsealed = Object.fromEntries(Object.entries(state).filter(([k]) => k !== 'seal'));
  return createHmac('sha256', secret).update(JSON.stringify(canonical(unsealed)), 'utf8').digest('hex');
}

/** Returns a reason when `state` is not a well-formed state sealed with `secret`. */
export function checkState(state: unknown, secret: string): string | null {
  const parsed = StateSchema.safeParse(state);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return `malformed state at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}`;
  }
  const s = parsed.data;
  if (s.log.some((t, i) => t.index !== i)) return 'log indices are not contiguous';
  const expected = Buffer.from(computeSeal(s, secret), 'hex');
  const given = Buffer.from(s.seal, 'hex');
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
    return 'seal mismatch: the state was modified or was not produced by this engine';
  }
  return null;
}

/** Freezes `value` and everything reachable from it. Values must be acyclic. */
export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
