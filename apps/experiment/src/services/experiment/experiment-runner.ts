import { SIM_START, assertSimTime, cycleLengthSec } from '@signal-lab/domain';
import type {
  ExperimentCommandPort,
  ExperimentDefinition,
  ExperimentPhase,
  ExperimentResult,
  PhaseSnapshot,
  SimulationPort,
} from '@signal-lab/domain';

export type RunnerLogger = (message: string) => void;

const defaultLogger: RunnerLogger = (message) => console.log(`[experiment-runner] ${message}`);

/**
 * Runs the same scenario twice, untouched then with the signal edit applied.
 *
 * A reset clears both the clock and every applied edit, so the edit is
 * always sent after the second reset and never before it.
 */
export class ExperimentRunner implements ExperimentCommandPort {
  constructor(
    private readonly sim: SimulationPort,
    private readonly log: RunnerLogger = defaultLogger,
  ) {}

  async run(definition: ExperimentDefinition): Promise<ExperimentResult> {
    const { signalId, targetTime } = definition;
    assertSimTime(targetTime);

    // ── Baseline ──────────────────────────────────────────────────────────────
    this.log(`reset: ${await this.sim.reset()}`);
    this.log(`baseline: advancing to ${targetTime}`);
    this.log(await this.sim.advanceTo(targetTime));
    const baseline = await this.collect('baseline', definition);

    // Config reads don't depend on the clock, but must precede the reset below
    const originalSignal = await this.sim.getSignalConfig(signalId);
    const appliedSignal = definition.mutation(originalSignal);
    this.log(
      `signal ${signalId}: cycle ${cycleLengthSec(originalSignal)}s -> ${cycleLengthSec(appliedSignal)}s`,
    );

    // ── Treatment ─────────────────────────────────────────────────────────────
    this.log(`reset: ${await this.sim.reset()}`);
    this.log(`update signal ${signalId}: ${await this.sim.setSignalConfig(appliedSignal)}`);
    this.log(`treatment: advancing to ${targetTime}`);
    this.log(await this.sim.advanceTo(targetTime));
    const treatment = await this.collect('treatment', definition);

    return { baseline, treatment, originalSignal, appliedSignal };
  }

  private async collect(
    phase: ExperimentPhase,
    { signalId, targetTime }: ExperimentDefinition,
  ): Promise<PhaseSnapshot> {
    const trips = await this.sim.getFinishedTrips();
    const delays = await this.sim.getDelays(signalId, SIM_START, targetTime);
    const throughput = await this.sim.getCumulativeThroughput(signalId);
    const agents = await this.sim.getAgentPositions();
    this.log(`${phase}: collected ${trips.length} trips, ${delays.length} directions`);
    return { phase, trips, delays, throughput, agents };
  }
}
