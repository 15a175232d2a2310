import { fetch } from 'undici';
import type { Dispatcher } from 'undici';
import { z } from 'zod';
import { NetworkError, ServerError, assertSimTime } from '@signal-lab/domain';
import type {
  AgentSnapshot,
  DirectionDelays,
  DirectionThroughput,
  SignalConfig,
  SimTime,
  SimulationPort,
  Trip,
} from '@signal-lab/domain';
import {
  agentPositionsSchema,
  decode,
  delaysSchema,
  finishedTripsSchema,
  parseJson,
  signalSchema,
  signalToWire,
  throughputSchema,
  toAgents,
  toDelays,
  toSignalConfig,
  toThroughput,
  toTrips,
} from './wire.js';

type QueryParams = Record<string, string | number>;

export interface HttpSimulationClientOptions {
  baseUrl: string;
  /** Abort a request after this many ms. Unset leaves the transport default. */
  requestTimeoutMs?: number;
  /** Custom undici dispatcher, e.g. a MockAgent in tests. */
  dispatcher?: Dispatcher;
}

function describeFailure(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.name === 'TimeoutError') return 'timed out';
  return err.cause instanceof Error ? `${err.message} (${err.cause.message})` : err.message;
}

/**
 * SimulationPort over the simulation's HTTP API. Every method is exactly one
 * request; nothing is retried and every payload is validated before use.
 */
export class HttpSimulationClient implements SimulationPort {
  private readonly baseUrl: string;

  constructor(private readonly opts: HttpSimulationClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
  }

  async getTime(): Promise<string> {
    return (await this.send('GET', '/sim/get-time')).trim();
  }

  async reset(): Promise<string> {
    return (await this.send('GET', '/sim/reset')).trim();
  }

  async advanceTo(target: SimTime): Promise<string> {
    const t = assertSimTime(target);
    return (await this.send('GET', '/sim/goto-time', { t })).trim();
  }

  async getFinishedTrips(): Promise<Trip[]> {
    return toTrips(await this.getJson('/data/get-finished-trips', finishedTripsSchema));
  }

  async getSignalConfig(signalId: number): Promise<SignalConfig> {
    return toSignalConfig(await this.getJson('/traffic-signals/get', signalSchema, { id: signalId }));
  }

  async setSignalConfig(config: SignalConfig): Promise<string> {
    return (await this.send('POST', '/traffic-signals/set', undefined, signalToWire(config))).trim();
  }

  async getDelays(signalId: number, from: SimTime, to: SimTime): Promise<DirectionDelays[]> {
    const params = { id: signalId, t1: assertSimTime(from), t2: assertSimTime(to) };
    return toDelays(await this.getJson('/traffic-signals/get-delays', delaysSchema, params));
  }

  async getCumulativeThroughput(signalId: number): Promise<DirectionThroughput[]> {
    return toThroughput(
      await this.getJson('/traffic-signals/get-cumulative-thruput', throughputSchema, {
        id: signalId,
      }),
    );
  }

  async getAgentPositions(): Promise<AgentSnapshot[]> {
    return toAgents(await this.getJson('/data/get-agent-positions', agentPositionsSchema));
  }

  // ─── Transport ──────────────────────────────────────────────────────────────

  private async getJson<T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    params?: QueryParams,
  ): Promise<z.output<T>> {
    const text = await this.send('GET', path, params);
    return decode(schema, parseJson(text, path), path);
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    params?: QueryParams,
    body?: unknown,
  ): Promise<string> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      url.searchParams.set(key, String(value));
    }

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const res = await fetch(url, {
        method,
        headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        dispatcher: this.opts.dispatcher,
        signal:
          this.opts.requestTimeoutMs === undefined
            ? undefined
            : AbortSignal.timeout(this.opts.requestTimeoutMs),
      });
      status = res.status;
      ok = res.ok;
      text = await res.text();
    } catch (err) {
      throw new NetworkError(`${method} ${path} failed: ${describeFailure(err)}`, { cause: err });
    }

    if (!ok) throw new ServerError(status, path, text);
    return text;
  }
}
