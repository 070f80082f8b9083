export {
  DEFAULT_CALL_METHOD,
  isCallable,
  isInvocable,
} from './core.ts';
export type {
  AnyCallable,
  BoundArgs,
  CallStep,
  CallStepDescriptor,
  Invocable,
  MethodBinding,
  MethodSpec,
  MethodStep,
  MethodStepDescriptor,
  PipelineLogger,
  PipelineOptions,
  Step,
  StepDescriptor,
} from './core.ts';
export { StepResolutionError } from './errors.ts';
export type { StepResolutionReason } from './errors.ts';
export { descriptorOf, normalizeStep, resolveStep } from './steps.ts';
export { ComputationPipeline, createPipeline, addStep } from './pipeline.ts';
export type { PipelineFunction } from './pipeline.ts';
export { validatePipelineSteps } from './validate.ts';
export { compose } from './pipeline-overloads.ts';
export type { Stage } from './pipeline-overloads.ts';
export { partial } from './partial.ts';
