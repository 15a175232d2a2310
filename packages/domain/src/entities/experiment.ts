import type { Trip } from './trip.js';
import type { DirectionDelays, DirectionThroughput } from './direction.js';
import type { AgentSnapshot } from './agent.js';
import type { SignalConfig } from './traffic-signal.js';
import type { SimTime } from './sim-time.js';

export type ExperimentPhase = 'baseline' | 'treatment';

/** Raw payloads collected at the end of one phase, before aggregation. */
export interface PhaseSnapshot {
  readonly phase: ExperimentPhase;
  readonly trips: readonly Trip[];
  readonly delays: readonly DirectionDelays[];
  readonly throughput: readonly DirectionThroughput[];
  readonly agents: readonly AgentSnapshot[];
}

/** Pure edit applied to the signal between phases. Must not mutate its input. */
export type SignalMutation = (config: SignalConfig) => SignalConfig;

export interface ExperimentDefinition {
  readonly signalId: number;
  readonly targetTime: SimTime;
  readonly mutation: SignalMutation;
}

export interface ExperimentResult {
  readonly baseline: PhaseSnapshot;
  readonly treatment: PhaseSnapshot;
  readonly originalSignal: SignalConfig;
  readonly appliedSignal: SignalConfig;
}
