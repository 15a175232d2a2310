export type StageType =
  | { readonly kind: 'fixed'; readonly durationSec: number }
  | {
      readonly kind: 'variable';
      readonly minimumSec: number;
      readonly delaySec: number;
      readonly additionalSec: number;
    };

/**
 * `extra` holds the fields the harness does not interpret (protected
 * movements, offsets, ...). They are sent back unchanged on update.
 */
export interface SignalStage {
  readonly stageType: StageType;
  readonly extra: Readonly<Record<string, unknown>>;
}

export interface SignalConfig {
  readonly id: number;
  readonly stages: readonly SignalStage[];
  readonly extra: Readonly<Record<string, unknown>>;
}

export function cycleLengthSec(config: SignalConfig): number {
  return config.stages.reduce((total, stage) => {
    const t = stage.stageType;
    return total + (t.kind === 'fixed' ? t.durationSec : t.minimumSec);
  }, 0);
}
