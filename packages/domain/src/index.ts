// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/trip.js';
export * from './entities/direction.js';
export * from './entities/traffic-signal.js';
export * from './entities/agent.js';
export * from './entities/sim-time.js';
export * from './entities/experiment.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/experiment-command.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/simulation.port.js';
