// pipeline/steps.ts - turning descriptors into steps, and steps into callables
import {
  type AnyCallable,
  DEFAULT_CALL_METHOD,
  type MethodSpec,
  type Step,
  type StepDescriptor,
  isCallable,
  isInvocable,
} from './core.ts';
import { StepResolutionError } from './errors.ts';
import { MethodBindingSchema } from './validate.ts';

/**
 * Stores references only: no lookups, no throwing. A bad descriptor is
 * reported when the step is resolved.
 */
export function normalizeStep(descriptor: StepDescriptor): Step {
  if (descriptor.length === 2) {
    const [name, target] = descriptor;
    const step: Step = { kind: 'call', name, target };
    return Object.freeze(step);
  }
  const [name, target, method] = descriptor;
  const step: Step = { kind: 'method', name, target, method };
  return Object.freeze(step);
}

/** A fresh descriptor for a normalized step. */
export function descriptorOf(step: Step): StepDescriptor {
  if (step.kind === 'call') return Object.freeze([step.name, step.target] as const);
  return Object.freeze([step.name, step.target, step.method] as const);
}

type ResolvedMethod = { method: string; boundArgs: readonly unknown[] };

function splitMethodSpec(spec: MethodSpec): ResolvedMethod | null {
  if (typeof spec === 'string') return { method: spec, boundArgs: [] };
  const parsed = MethodBindingSchema.safeParse(spec);
  if (!parsed.success) return null;
  const [method, { args }] = parsed.data;
  return { method, boundArgs: args };
}

export function resolveStep(step: Step, index: number): AnyCallable {
  const { name, target } = step;

  if (step.kind === 'call') {
    if (isCallable(target)) return target;
    if (isInvocable(target)) return target.invoke.bind(target);
    throw new StepResolutionError(
      name,
      index,
      'not-callable',
      `target is neither a function nor an object with an '${DEFAULT_CALL_METHOD}' method`,
    );
  }

  const spec = splitMethodSpec(step.method);
  if (!spec) {
    throw new StepResolutionError(
      name,
      index,
      'invalid-binding',
      'method spec must be a name or a [name, { args }] pair',
    );
  }

  const { method, boundArgs } = spec;
  if (target === null || (typeof target !== 'object' && typeof target !== 'function')) {
    throw new StepResolutionError(
      name,
      index,
      'missing-method',
      `target is not an object, so it has no method '${method}'`,
    );
  }
  const member: unknown = Reflect.get(target, method);
  if (!isCallable(member)) {
    throw new StepResolutionError(
      name,
      index,
      'missing-method',
      member === undefined
        ? `target has no method '${method}'`
        : `target member '${method}' is not a function`,
    );
  }

  if (boundArgs.length === 0) return member.bind(target);
  return (...rest: unknown[]) => member.apply(target, [...boundArgs, ...rest]);
}
