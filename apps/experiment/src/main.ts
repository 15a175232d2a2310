import 'dotenv/config';
import { HttpSimulationClient } from '@signal-lab/adapters';
import { loadConfig } from './config.js';
import { ExperimentRunner } from './services/experiment/experiment-runner.js';
import { scaleFixedStage } from './services/experiment/signal-mutations.js';
import { summarizePhase } from './services/metrics/metrics-aggregator.js';
import { ReportPrinter } from './services/report/report-printer.js';

/**
 * Signal-timing experiment.
 *
 * Env vars (see .env.example):
 *   SIM_API_BASE_URL       simulation API (default: http://localhost:1234)
 *   SIGNAL_ID              signal under study (default: 67)
 *   TARGET_TIME            simulated time each phase runs to (default: 12:00:00)
 *   STAGE_INDEX            stage whose fixed duration is scaled (default: 1)
 *   FIXED_DURATION_FACTOR  scale factor (default: 2)
 *   REQUEST_TIMEOUT_MS     per-request timeout (default: none)
 */
async function main() {
  const config = loadConfig();
  const sim = new HttpSimulationClient({
    baseUrl: config.apiBaseUrl,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  console.log(`[experiment] ${config.apiBaseUrl} clock is at ${await sim.getTime()}`);

  const result = await new ExperimentRunner(sim).run({
    signalId: config.signalId,
    targetTime: config.targetTime,
    mutation: scaleFixedStage(config.stageIndex, config.fixedDurationFactor),
  });

  console.log('');
  new ReportPrinter().print(summarizePhase(result.baseline), summarizePhase(result.treatment));
}

main().catch((err) => {
  console.error('[experiment] fatal', err instanceof Error ? err.message : err);
  process.exit(1);
});
