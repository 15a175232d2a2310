import type { ExperimentDefinition, ExperimentResult } from '../../entities/experiment.js';

export interface ExperimentCommandPort {
  run(definition: ExperimentDefinition): Promise<ExperimentResult>;
}
