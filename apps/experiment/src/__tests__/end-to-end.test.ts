/**
 * Runs the whole experiment over HTTP against an in-process stand-in of the
 * simulation server.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { Agent } from 'undici';
import { HttpSimulationClient } from '@signal-lab/adapters';
import { ServerError } from '@signal-lab/domain';
import { ExperimentRunner } from '../services/experiment/experiment-runner.js';
import { doubleFixedStage } from '../services/experiment/signal-mutations.js';
import { summarizePhase } from '../services/metrics/metrics-aggregator.js';
import { ReportPrinter } from '../services/report/report-printer.js';
import { FakeSimulation } from './support/fake-simulation.js';
import { startFakeSimServer } from './support/fake-sim-server.js';
import type { RunningFakeSim } from './support/fake-sim-server.js';
import { baselineFixture, makeSignal, treatmentFixture } from './support/fixtures.js';

let sim: FakeSimulation;
let server: RunningFakeSim;
let dispatcher: Agent;
let client: HttpSimulationClient;
let runner: ExperimentRunner;

beforeEach(async () => {
  sim = new FakeSimulation([makeSignal()], {
    baseline: baselineFixture(),
    treatment: treatmentFixture(),
  });
  server = await startFakeSimServer(sim);
  dispatcher = new Agent();
  client = new HttpSimulationClient({ baseUrl: server.baseUrl, dispatcher });
  runner = new ExperimentRunner(client, () => undefined);
});

afterEach(async () => {
  await dispatcher.close();
  await server.close();
});

describe('signal experiment over HTTP', () => {
  it('prints the before/after report', async () => {
    const result = await runner.run({
      signalId: 67,
      targetTime: '12:00:00',
      mutation: doubleFixedStage(1),
    });

    const lines: string[] = [];
    new ReportPrinter((line) => lines.push(line)).print(
      summarizePhase(result.baseline),
      summarizePhase(result.treatment),
    );

    expect(lines).toEqual([
      'Baseline: 2 finished trips, total of 75 seconds',
      'Average position of all active pedestrians: -122.375, 47.625',
      '',
      'Experiment: 3 finished trips, total of 80 seconds',
      'No active pedestrians',
      '',
      '1 more trips finished after the edits (higher is better)',
      'Experiment was -5 seconds faster, over all trips',
      '',
      'Direction' + ' '.repeat(36) + 'avg delay before' + ' '.repeat(6) + 'avg delay after' +
        ' '.repeat(4) + 'thruput before' + ' '.repeat(5) + 'thruput after',
      'Road #12 (N) -> Road #7 (S)' + ' '.repeat(30) + '12.3' + ' '.repeat(18) + '9.8' +
        ' '.repeat(16) + '40' + ' '.repeat(16) + '55',
    ]);
  });

  it('sends the full edited signal back, uninterpreted fields included', async () => {
    await runner.run({ signalId: 67, targetTime: '12:00:00', mutation: doubleFixedStage(1) });
    expect(sim.appliedEdits.get(67)).toEqual(doubleFixedStage(1)(makeSignal()));
  });

  it('leaves the simulation at the target time', async () => {
    await runner.run({ signalId: 67, targetTime: '06:15:00', mutation: doubleFixedStage(1) });
    expect(await client.getTime()).toBe('06:15:00');
  });

  it('surfaces an HTTP error status as a ServerError', async () => {
    const run = runner.run({ signalId: 99, targetTime: '12:00:00', mutation: doubleFixedStage(1) });
    await expect(run).rejects.toBeInstanceOf(ServerError);
    await expect(run).rejects.toMatchObject({ status: 404, path: '/traffic-signals/get-delays' });
  });
});
