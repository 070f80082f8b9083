/**
 * @fileoverview Core types for the computation pipeline.
 *
 * A step is declared as a readonly tuple and normalized into a tagged
 * variant at construction time. Nothing here resolves or calls anything;
 * see `steps.ts` for that.
 */

export type AnyCallable = (...args: any[]) => unknown;

/** Name of the method used when a step targets an object with no method name. */
export const DEFAULT_CALL_METHOD = 'invoke';

/**
 * Capability interface for objects that can stand in for a function in the
 * two-element step form.
 */
export interface Invocable {
  invoke(value: unknown, ...extra: unknown[]): unknown;
}

/** Arguments fixed ahead of time, placed before the running value. */
export type BoundArgs = { readonly args: readonly unknown[] };

export type MethodBinding = readonly [method: string, bound: BoundArgs];

export type MethodSpec = string | MethodBinding;

export type CallStepDescriptor = readonly [name: string, target: object];

export type MethodStepDescriptor = readonly [name: string, target: object, method: MethodSpec];

export type StepDescriptor = CallStepDescriptor | MethodStepDescriptor;

export type CallStep = {
  readonly kind: 'call';
  readonly name: string;
  readonly target: object;
};

export type MethodStep = {
  readonly kind: 'method';
  readonly name: string;
  readonly target: object;
  readonly method: MethodSpec;
};

export type Step = CallStep | MethodStep;

export type PipelineLogger = {
  debug: (message: string, ...args: unknown[]) => void;
};

export type PipelineOptions = {
  /** Shown in log lines; defaults to `pipeline`. */
  label?: string;
  logger?: PipelineLogger;
};

export function isCallable(value: unknown): value is AnyCallable {
  return typeof value === 'function';
}

export function isInvocable(value: unknown): value is Invocable {
  return (
    typeof value === 'object' &&
    value !== null &&
    isCallable(Reflect.get(value, DEFAULT_CALL_METHOD))
  );
}
