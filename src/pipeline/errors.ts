// pipeline/errors.ts

export type StepResolutionReason = 'not-callable' | 'missing-method' | 'invalid-binding';

/**
 * Thrown when invocation reaches a step whose target cannot be turned into a
 * callable. Steps before it have already run.
 */
export class StepResolutionError extends TypeError {
  readonly stepName: string;
  readonly stepIndex: number;
  readonly reason: StepResolutionReason;

  constructor(stepName: string, stepIndex: number, reason: StepResolutionReason, message: string) {
    super(`Step '${stepName}' (#${stepIndex}): ${message}`);
    this.name = 'StepResolutionError';
    this.stepName = stepName;
    this.stepIndex = stepIndex;
    this.reason = reason;
  }
}
