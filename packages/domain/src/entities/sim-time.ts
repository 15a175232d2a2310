import { DataShapeError } from '../errors.js';

/** Simulated time of day as `HH:MM:SS`, the format the simulation API accepts. */
export type SimTime = string;

export const SIM_START: SimTime = '00:00:00';

const SIM_TIME_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d)$/;

export function parseSimTime(text: string): number {
  const match = SIM_TIME_PATTERN.exec(text);
  if (!match) {
    throw new DataShapeError(`invalid simulated time "${text}", expected HH:MM:SS`);
  }
  const [, hh = '0', mm = '0', ss = '0'] = match;
  return Number(hh) * 3600 + Number(mm) * 60 + Number(ss);
}

export function formatSimTime(totalSec: number): SimTime {
  if (!Number.isInteger(totalSec) || totalSec < 0) {
    throw new DataShapeError(`cannot format ${totalSec} as a simulated time`);
  }
  const pad = (n: number) => String(n).padStart(2, '0');
  const hh = Math.floor(totalSec / 3600);
  const mm = Math.floor((totalSec % 3600) / 60);
  return `${pad(hh)}:${pad(mm)}:${pad(totalSec % 60)}`;
}

export function isSimTime(text: string): boolean {
  return SIM_TIME_PATTERN.test(text);
}

export function assertSimTime(text: string): SimTime {
  parseSimTime(text);
  return text;
}
