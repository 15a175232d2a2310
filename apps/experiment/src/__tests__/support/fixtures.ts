import type {
  AgentSnapshot,
  DirectionDelays,
  DirectionKey,
  DirectionThroughput,
  SignalConfig,
  Trip,
} from '@signal-lab/domain';

export interface PhaseFixture {
  trips: Trip[];
  delays: DirectionDelays[];
  throughput: DirectionThroughput[];
  agents: AgentSnapshot[];
}

export function direction(
  fromId: number,
  fromDir: string,
  toId: number,
  toDir: string,
  isCrosswalk = false,
): DirectionKey {
  return {
    from: { id: fromId, directionCode: fromDir },
    to: { id: toId, directionCode: toDir },
    isCrosswalk,
  };
}

export const NORTH_TO_SOUTH = direction(12, 'N', 7, 'S');
export const EAST_TO_WEST = direction(3, 'E', 9, 'W');
export const CROSSWALK = direction(12, 'N', 12, 'S', true);

export function makeSignal(overrides: Partial<SignalConfig> = {}): SignalConfig {
  return {
    id: 67,
    stages: [
      { stageType: { kind: 'fixed', durationSec: 30 }, extra: { protected_movements: ['a'] } },
      { stageType: { kind: 'fixed', durationSec: 20 }, extra: { protected_movements: ['b'] } },
      {
        stageType: { kind: 'variable', minimumSec: 5, delaySec: 1, additionalSec: 10 },
        extra: {},
      },
    ],
    extra: { offset: 0 },
    ...overrides,
  };
}

/** Trips {1:30, 2:45}; 12.3s mean delay and 40 vehicles north to south. */
export function baselineFixture(): PhaseFixture {
  return {
    trips: [
      { id: 1, durationSec: 30 },
      { id: 2, durationSec: 45 },
      { id: 4 },
    ],
    delays: [
      { direction: NORTH_TO_SOUTH, delaysSec: [10, 14.6] },
      { direction: CROSSWALK, delaysSec: [50] },
    ],
    throughput: [
      { direction: NORTH_TO_SOUTH, count: 40 },
      { direction: CROSSWALK, count: 12 },
    ],
    agents: [
      { position: { longitude: -122.5, latitude: 47.5 } },
      { position: { longitude: -122.25, latitude: 47.75 } },
      { position: { longitude: -120, latitude: 40 }, vehicleType: 'Car' },
    ],
  };
}

/** Trips {1:20, 2:50, 3:10}; 9.8s mean delay and 55 vehicles north to south. */
export function treatmentFixture(): PhaseFixture {
  return {
    trips: [
      { id: 1, durationSec: 20 },
      { id: 2, durationSec: 50 },
      { id: 3, durationSec: 10 },
    ],
    delays: [
      { direction: NORTH_TO_SOUTH, delaysSec: [9.8] },
      { direction: EAST_TO_WEST, delaysSec: [4, 6] },
    ],
    throughput: [
      { direction: NORTH_TO_SOUTH, count: 55 },
      { direction: EAST_TO_WEST, count: 8 },
    ],
    agents: [],
  };
}
