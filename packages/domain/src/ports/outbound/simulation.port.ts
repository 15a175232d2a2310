import type { Trip } from '../../entities/trip.js';
import type { DirectionDelays, DirectionThroughput } from '../../entities/direction.js';
import type { SignalConfig } from '../../entities/traffic-signal.js';
import type { AgentSnapshot } from '../../entities/agent.js';
import type { SimTime } from '../../entities/sim-time.js';

/**
 * One method per capability of the remote simulation. Acknowledging calls
 * resolve to whatever text the simulation answered with.
 */
export interface SimulationPort {
  getTime(): Promise<string>;
  /** Rewinds to midnight and discards every applied edit. */
  reset(): Promise<string>;
  /** Runs forward until the clock reaches `target`; never call with a time in the past. */
  advanceTo(target: SimTime): Promise<string>;
  getFinishedTrips(): Promise<Trip[]>;
  getSignalConfig(signalId: number): Promise<SignalConfig>;
  /** The edit lasts until the next reset. */
  setSignalConfig(config: SignalConfig): Promise<string>;
  getDelays(signalId: number, from: SimTime, to: SimTime): Promise<DirectionDelays[]>;
  /** Counts since the last reset. */
  getCumulativeThroughput(signalId: number): Promise<DirectionThroughput[]>;
  getAgentPositions(): Promise<AgentSnapshot[]>;
}
