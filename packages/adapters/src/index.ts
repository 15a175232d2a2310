// ─── HTTP Simulation Adapter ──────────────────────────────────────────────────
export { HttpSimulationClient } from './http/http-simulation.client.js';
export type { HttpSimulationClientOptions } from './http/http-simulation.client.js';

// ─── Wire Codec ───────────────────────────────────────────────────────────────
export {
  decode,
  directionKeyToWire,
  signalToWire,
  signalSchema,
  toSignalConfig,
} from './http/wire.js';
export type { WireDirectionKey } from './http/wire.js';
