/**
 * @fileoverview The computation pipeline.
 *
 * A pipeline threads a running value through its steps in declaration order.
 * Construction only records the steps; each step is resolved to a callable
 * when an invocation reaches it, so a misconfigured step fails late, at that
 * step, after the earlier ones have run.
 */

import { createLogger } from '../utils/logger.ts';
import type { PipelineLogger, PipelineOptions, Step, StepDescriptor } from './core.ts';
import { descriptorOf, normalizeStep, resolveStep } from './steps.ts';
import { validatePipelineSteps } from './validate.ts';

const defaultLogger = createLogger('pipeline');

export class ComputationPipeline<TInput = unknown, TOutput = unknown> {
  readonly steps: readonly Step[];
  readonly label: string;
  readonly logger: PipelineLogger;

  constructor(steps: readonly StepDescriptor[], options: PipelineOptions = {}) {
    this.steps = Object.freeze(steps.map((descriptor) => normalizeStep(descriptor)));
    this.label = options.label ?? 'pipeline';
    this.logger = options.logger ?? defaultLogger;
  }

  get size(): number {
    return this.steps.length;
  }

  /** Descriptors rebuilt from the steps fixed at construction. */
  get descriptors(): StepDescriptor[] {
    return this.steps.map(descriptorOf);
  }

  get stepNames(): string[] {
    return this.steps.map((step) => step.name);
  }

  /** Target of the first step with this name. Names are not unique. */
  getStepTarget(name: string): object | undefined {
    return this.steps.find((step) => step.name === name)?.target;
  }

  /**
   * Runs every step in order. `extra` is passed to the first step only; later
   * steps receive just the previous step's result.
   */
  run(initial: TInput, ...extra: unknown[]): TOutput {
    let current: unknown = initial;
    for (const [index, step] of this.steps.entries()) {
      this.logger.debug(`${this.label}: step ${index + 1}/${this.steps.length} '${step.name}'`);
      const fn = resolveStep(step, index);
      current = index === 0 ? fn(current, ...extra) : fn(current);
    }
    return current as TOutput;
  }
}

export type PipelineFunction<TInput = unknown, TOutput = unknown> = ((
  initial: TInput,
  ...extra: unknown[]
) => TOutput) & {
  readonly stepNames: readonly string[];
  readonly pipeline: ComputationPipeline<TInput, TOutput>;
};

/** Callable form of {@link ComputationPipeline}. */
export function createPipeline<TInput = unknown, TOutput = unknown>(
  steps: readonly StepDescriptor[],
  options?: PipelineOptions,
): PipelineFunction<TInput, TOutput> {
  const pipeline = new ComputationPipeline<TInput, TOutput>(steps, options);
  const run = (initial: TInput, ...extra: unknown[]) => pipeline.run(initial, ...extra);
  return Object.assign(run, {
    stepNames: Object.freeze(pipeline.stepNames),
    pipeline,
  });
}

/**
 * Returns a new pipeline with `step` appended; `pipeline` is left as it was.
 * Unlike construction, the added step is validated up front.
 */
export function addStep<TInput, TOutput>(
  pipeline: ComputationPipeline<TInput, unknown>,
  step: StepDescriptor,
  options?: PipelineOptions,
): ComputationPipeline<TInput, TOutput> {
  validatePipelineSteps([step]);
  return new ComputationPipeline<TInput, TOutput>([...pipeline.descriptors, step], {
    label: pipeline.label,
    logger: pipeline.logger,
    ...options,
  });
}
