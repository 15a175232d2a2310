export interface GeoPosition {
  readonly longitude: number;
  readonly latitude: number;
}

export interface AgentSnapshot {
  readonly position: GeoPosition;
  /** Absent for pedestrians. */
  readonly vehicleType?: string;
}

export function isPedestrian(agent: AgentSnapshot): boolean {
  return agent.vehicleType === undefined;
}
