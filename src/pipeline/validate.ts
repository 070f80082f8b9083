// pipeline/validate.ts - opt-in, up-front checks for step descriptors
import { z } from 'zod';
import { DEFAULT_CALL_METHOD, type StepDescriptor, isCallable, isInvocable } from './core.ts';

const StepName = z.string();

const Target = z.custom<object>(
  (val) => (typeof val === 'object' && val !== null) || typeof val === 'function',
  { message: 'Target must be an object or a function' },
);

export const MethodBindingSchema = z.tuple([z.string(), z.object({ args: z.array(z.unknown()) })]);

const MethodSpecSchema = z.union([z.string(), MethodBindingSchema]);

const CallStepSchema = z.tuple([StepName, Target]).refine(
  ([, target]) => isCallable(target) || isInvocable(target),
  {
    message: `Target must be a function or expose an '${DEFAULT_CALL_METHOD}' method`,
    path: [1],
  },
);

const MethodStepSchema = z.tuple([StepName, Target, MethodSpecSchema]);

/**
 * Checks every descriptor now rather than when the pipeline reaches it.
 * Returns true, or throws naming the first bad step.
 */
export function validatePipelineSteps(steps: unknown): steps is StepDescriptor[] {
  if (!Array.isArray(steps)) {
    throw new Error('Pipeline steps must be an array');
  }

  steps.forEach((step: unknown, index) => {
    if (!Array.isArray(step) || (step.length !== 2 && step.length !== 3)) {
      throw new Error(
        `Invalid pipeline step at index ${index}: expected [name, target] or [name, target, method]`,
      );
    }
    if (step.length === 2) {
      const result = CallStepSchema.safeParse(step);
      if (!result.success) {
        throw new Error(`Invalid pipeline step at index ${index}:\n${z.prettifyError(result.error)}`);
      }
      return;
    }

    const result = MethodStepSchema.safeParse(step);
    if (!result.success) {
      throw new Error(`Invalid pipeline step at index ${index}:\n${z.prettifyError(result.error)}`);
    }
    const [, target, spec] = result.data;
    const method = typeof spec === 'string' ? spec : spec[0];
    if (!isCallable(Reflect.get(target, method))) {
      throw new Error(
        `Invalid pipeline step at index ${index}: target has no callable method '${method}'`,
      );
    }
  });

  return true;
}
