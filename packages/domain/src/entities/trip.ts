export type TripId = number;

export interface Trip {
  readonly id: TripId;
  /** Seconds from departure to arrival; absent when the trip was cancelled. */
  readonly durationSec?: number;
}

export type FinishedTrip = Trip & { readonly durationSec: number };

export function isFinished(trip: Trip): trip is FinishedTrip {
  return trip.durationSec !== undefined;
}

export function isCancelled(trip: Trip): boolean {
  return !isFinished(trip);
}
