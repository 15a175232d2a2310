import { DataShapeError } from '@signal-lab/domain';
import type { SignalMutation, SignalStage } from '@signal-lab/domain';

/** Multiply the fixed duration of one stage. The input config is left untouched. */
export function scaleFixedStage(stageIndex: number, factor: number): SignalMutation {
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new DataShapeError(`stage duration factor must be positive, got ${factor}`);
  }

  return (config) => {
    const stage = config.stages[stageIndex];
    if (!stage) {
      throw new DataShapeError(
        `signal ${config.id} has ${config.stages.length} stages, no stage ${stageIndex}`,
      );
    }
    const { stageType } = stage;
    if (stageType.kind !== 'fixed') {
      throw new DataShapeError(
        `stage ${stageIndex} of signal ${config.id} is ${stageType.kind}, not fixed`,
      );
    }

    const scaled: SignalStage = {
      ...stage,
      stageType: { kind: 'fixed', durationSec: stageType.durationSec * factor },
    };
    return {
      ...config,
      stages: config.stages.map((s, i) => (i === stageIndex ? scaled : s)),
    };
  };
}

export function doubleFixedStage(stageIndex: number): SignalMutation {
  return scaleFixedStage(stageIndex, 2);
}
