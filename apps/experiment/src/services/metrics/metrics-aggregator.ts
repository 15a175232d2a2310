import { DataShapeError, directionLabel, isFinished, isPedestrian } from '@signal-lab/domain';
import type {
  AgentSnapshot,
  DirectionDelays,
  DirectionThroughput,
  GeoPosition,
  PhaseSnapshot,
  Trip,
  TripId,
} from '@signal-lab/domain';

/** Aggregated view of one phase; direction maps are keyed by `directionLabel`. */
export interface PhaseSummary {
  tripDurations: Map<TripId, number>;
  meanDelays: Map<string, string>;
  throughput: Map<string, number>;
  pedestrianCentroid: GeoPosition | null;
}

/** Trip id to duration in seconds. Cancelled trips are dropped. */
export function tripDurations(trips: readonly Trip[]): Map<TripId, number> {
  const out = new Map<TripId, number>();
  for (const trip of trips.filter(isFinished)) out.set(trip.id, trip.durationSec);
  return out;
}

export function totalDurationSec(durations: ReadonlyMap<TripId, number>): number {
  let total = 0;
  for (const d of durations.values()) total += d;
  return total;
}

export function mean(samples: readonly number[]): number {
  if (samples.length === 0) {
    throw new DataShapeError('cannot average an empty sample sequence');
  }
  return samples.reduce((sum, x) => sum + x, 0) / samples.length;
}

/**
 * One decimal place, a tie going to the even digit (10.25 -> "10.2").
 * Only multiples of 0.25 with an odd quarter count sit exactly on a tie;
 * every other value is already rounded correctly by `toFixed`.
 */
export function formatOneDecimal(x: number): string {
  const quarters = x * 4;
  if (!Number.isInteger(quarters) || quarters % 2 === 0) return x.toFixed(1);
  const below = Math.floor(x * 10);
  const even = below % 2 === 0 ? below : below + 1;
  return (even / 10).toFixed(1);
}

/**
 * Mean delay per vehicular direction, formatted with one decimal ("20.0").
 * Crosswalks and directions with no delay samples are left out.
 */
export function meanDelayPerDirection(delays: readonly DirectionDelays[]): Map<string, string> {
  const out = new Map<string, string>();
  for (const { direction, delaysSec } of delays) {
    if (direction.isCrosswalk || delaysSec.length === 0) continue;
    out.set(directionLabel(direction), formatOneDecimal(mean(delaysSec)));
  }
  return out;
}

/**
 * Cumulative count per vehicular direction. Only crosswalks are left out:
 * zero counts are kept, unlike empty delay samples.
 */
export function throughputPerDirection(
  throughput: readonly DirectionThroughput[],
): Map<string, number> {
  const out = new Map<string, number>();
  for (const { direction, count } of throughput) {
    if (direction.isCrosswalk) continue;
    out.set(directionLabel(direction), count);
  }
  return out;
}

/** Mean position of agents without a vehicle, or null when there are none. */
export function averagePedestrianPosition(agents: readonly AgentSnapshot[]): GeoPosition | null {
  const pedestrians = agents.filter(isPedestrian);
  if (pedestrians.length === 0) return null;
  return {
    longitude: mean(pedestrians.map((a) => a.position.longitude)),
    latitude: mean(pedestrians.map((a) => a.position.latitude)),
  };
}

export function summarizePhase(snapshot: PhaseSnapshot): PhaseSummary {
  return {
    tripDurations: tripDurations(snapshot.trips),
    meanDelays: meanDelayPerDirection(snapshot.delays),
    throughput: throughputPerDirection(snapshot.throughput),
    pedestrianCentroid: averagePedestrianPosition(snapshot.agents),
  };
}
