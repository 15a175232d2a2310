import { z } from 'zod';
import { isSimTime } from '@signal-lab/domain';
import type { SimTime } from '@signal-lab/domain';

const envSchema = z.object({
  SIM_API_BASE_URL: z.string().url().default('http://localhost:1234'),
  SIGNAL_ID: z.coerce.number().int().nonnegative().default(67),
  TARGET_TIME: z.string().default('12:00:00').refine(isSimTime, 'expected HH:MM:SS'),
  STAGE_INDEX: z.coerce.number().int().nonnegative().default(1),
  FIXED_DURATION_FACTOR: z.coerce.number().positive().default(2),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface ExperimentConfig {
  apiBaseUrl: string;
  signalId: number;
  targetTime: SimTime;
  stageIndex: number;
  fixedDurationFactor: number;
  requestTimeoutMs?: number;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExperimentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`),
    );
  }
  const e = parsed.data;
  return {
    apiBaseUrl: e.SIM_API_BASE_URL,
    signalId: e.SIGNAL_ID,
    targetTime: e.TARGET_TIME,
    stageIndex: e.STAGE_INDEX,
    fixedDurationFactor: e.FIXED_DURATION_FACTOR,
    requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
  };
}
