export interface DirectedRoad {
  readonly id: number;
  readonly directionCode: string;
}

/** A directed movement through an intersection, from one road to another. */
export interface DirectionKey {
  readonly from: DirectedRoad;
  readonly to: DirectedRoad;
  readonly isCrosswalk: boolean;
}

export interface DirectionDelays {
  readonly direction: DirectionKey;
  readonly delaysSec: readonly number[];
}

export interface DirectionThroughput {
  readonly direction: DirectionKey;
  readonly count: number;
}

export function roadLabel(road: DirectedRoad): string {
  return `Road #${road.id} (${road.directionCode})`;
}

/**
 * Canonical label for a direction. Baseline and treatment maps are joined on
 * this string, so every map keyed by direction must be built through it.
 */
export function directionLabel(key: DirectionKey): string {
  return `${roadLabel(key.from)} -> ${roadLabel(key.to)}`;
}
