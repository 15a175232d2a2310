import { z } from 'zod';
import { DataShapeError } from '@signal-lab/domain';
import type {
  AgentSnapshot,
  DirectionDelays,
  DirectionKey,
  DirectionThroughput,
  SignalConfig,
  SignalStage,
  StageType,
  Trip,
} from '@signal-lab/domain';

// ─── Schemas ──────────────────────────────────────────────────────────────────

const directedRoadSchema = z.object({
  id: z.number().int().nonnegative(),
  dir: z.string().min(1),
});

const directionKeySchema = z.object({
  crosswalk: z.boolean(),
  from: directedRoadSchema,
  to: directedRoadSchema,
});

export const finishedTripsSchema = z.array(
  z.object({
    id: z.number().int().nonnegative(),
    duration: z.number().nonnegative().nullable().optional(),
  }),
);

export const agentPositionsSchema = z.object({
  agents: z.array(
    z.object({
      pos: z.object({ longitude: z.number(), latitude: z.number() }),
      vehicle_type: z.string().nullable().optional(),
    }),
  ),
});

export const delaysSchema = z.object({
  per_direction: z.array(z.tuple([directionKeySchema, z.array(z.number().nonnegative())])),
});

export const throughputSchema = z.object({
  per_direction: z.array(z.tuple([directionKeySchema, z.number().int().nonnegative()])),
});

const stageTypeSchema = z.union([
  z.object({ Fixed: z.number().nonnegative() }).strict(),
  z.object({ Variable: z.tuple([z.number(), z.number(), z.number()]) }).strict(),
]);

const stageSchema = z.object({ stage_type: stageTypeSchema }).passthrough();

export const signalSchema = z
  .object({
    id: z.number().int().nonnegative(),
    stages: z.array(stageSchema),
  })
  .passthrough();

export type WireDirectionKey = z.infer<typeof directionKeySchema>;
export type WireStageType = z.infer<typeof stageTypeSchema>;

// ─── Decoding ─────────────────────────────────────────────────────────────────

/** Validate `payload` against `schema`, raising DataShapeError with the zod issues. */
export function decode<T extends z.ZodTypeAny>(
  schema: T,
  payload: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((i) => ({ path: i.path, message: i.message }));
    const first = issues[0];
    const detail = first ? `: ${first.path.join('.') || '(root)'} ${first.message}` : '';
    throw new DataShapeError(`malformed ${what} payload${detail}`, issues, {
      cause: result.error,
    });
  }
  return result.data;
}

export function parseJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new DataShapeError(`${what} did not return JSON`, [], { cause: err });
  }
}

function toDirectionKey(wire: WireDirectionKey): DirectionKey {
  return {
    from: { id: wire.from.id, directionCode: wire.from.dir },
    to: { id: wire.to.id, directionCode: wire.to.dir },
    isCrosswalk: wire.crosswalk,
  };
}

function toStageType(wire: WireStageType): StageType {
  if ('Fixed' in wire) return { kind: 'fixed', durationSec: wire.Fixed };
  const [minimumSec, delaySec, additionalSec] = wire.Variable;
  return { kind: 'variable', minimumSec, delaySec, additionalSec };
}

export function toTrips(wire: z.infer<typeof finishedTripsSchema>): Trip[] {
  return wire.map((t) =>
    t.duration === null || t.duration === undefined
      ? { id: t.id }
      : { id: t.id, durationSec: t.duration },
  );
}

export function toAgents(wire: z.infer<typeof agentPositionsSchema>): AgentSnapshot[] {
  return wire.agents.map((a) => {
    const position = { longitude: a.pos.longitude, latitude: a.pos.latitude };
    return a.vehicle_type === null || a.vehicle_type === undefined
      ? { position }
      : { position, vehicleType: a.vehicle_type };
  });
}

export function toDelays(wire: z.infer<typeof delaysSchema>): DirectionDelays[] {
  return wire.per_direction.map(([key, delaysSec]) => ({
    direction: toDirectionKey(key),
    delaysSec,
  }));
}

export function toThroughput(wire: z.infer<typeof throughputSchema>): DirectionThroughput[] {
  return wire.per_direction.map(([key, count]) => ({ direction: toDirectionKey(key), count }));
}

export function toSignalConfig(wire: z.infer<typeof signalSchema>): SignalConfig {
  const { id, stages, ...extra } = wire;
  return {
    id,
    stages: stages.map(({ stage_type, ...stageExtra }): SignalStage => ({
      stageType: toStageType(stage_type),
      extra: stageExtra,
    })),
    extra,
  };
}

// ─── Encoding ─────────────────────────────────────────────────────────────────

export function directionKeyToWire(key: DirectionKey): WireDirectionKey {
  return {
    crosswalk: key.isCrosswalk,
    from: { id: key.from.id, dir: key.from.directionCode },
    to: { id: key.to.id, dir: key.to.directionCode },
  };
}

function stageTypeToWire(stageType: StageType): WireStageType {
  switch (stageType.kind) {
    case 'fixed':
      return { Fixed: stageType.durationSec };
    case 'variable':
      return {
        Variable: [stageType.minimumSec, stageType.delaySec, stageType.additionalSec],
      };
  }
}

/** Full signal object as the update endpoint expects it, uninterpreted fields included. */
export function signalToWire(config: SignalConfig): Record<string, unknown> {
  return {
    ...config.extra,
    id: config.id,
    stages: config.stages.map((stage) => ({
      ...stage.extra,
      stage_type: stageTypeToWire(stage.stageType),
    })),
  };
}
