/**
 * @fileoverview Typed overloads for composing single-argument functions.
 *
 * `compose` infers the type at each step boundary. It runs on
 * ComputationPipeline, so ordering and error propagation are the same as for
 * descriptor-built pipelines.
 */

import type { AnyCallable } from './core.ts';
import { ComputationPipeline } from './pipeline.ts';

export type Stage<I, O> = (value: I) => O;

// ---- Overloads (extend as needed) ----
export function compose(): <T>(value: T) => T;
export function compose<A, B>(s1: Stage<A, B>): Stage<A, B>;
export function compose<A, B, C>(s1: Stage<A, B>, s2: Stage<B, C>): Stage<A, C>;
export function compose<A, B, C, D>(s1: Stage<A, B>, s2: Stage<B, C>, s3: Stage<C, D>): Stage<A, D>;
export function compose<A, B, C, D, E>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
): Stage<A, E>;
export function compose<A, B, C, D, E, F>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
  s5: Stage<E, F>,
): Stage<A, F>;
export function compose<A, B, C, D, E, F, G>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
  s5: Stage<E, F>,
  s6: Stage<F, G>,
): Stage<A, G>;
export function compose<A, B, C, D, E, F, G, H>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
  s5: Stage<E, F>,
  s6: Stage<F, G>,
  s7: Stage<G, H>,
): Stage<A, H>;
export function compose<A, B, C, D, E, F, G, H, I>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
  s5: Stage<E, F>,
  s6: Stage<F, G>,
  s7: Stage<G, H>,
  s8: Stage<H, I>,
): Stage<A, I>;
export function compose<A, B, C, D, E, F, G, H, I, J>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
  s5: Stage<E, F>,
  s6: Stage<F, G>,
  s7: Stage<G, H>,
  s8: Stage<H, I>,
  s9: Stage<I, J>,
): Stage<A, J>;
export function compose<A, B, C, D, E, F, G, H, I, J, K>(
  s1: Stage<A, B>,
  s2: Stage<B, C>,
  s3: Stage<C, D>,
  s4: Stage<D, E>,
  s5: Stage<E, F>,
  s6: Stage<F, G>,
  s7: Stage<G, H>,
  s8: Stage<H, I>,
  s9: Stage<I, J>,
  s10: Stage<J, K>,
): Stage<A, K>;

// ---- Implementation ----
export function compose(...stages: AnyCallable[]): AnyCallable {
  const pipeline = new ComputationPipeline(
    stages.map((stage, index) => [stage.name || `stage${index + 1}`, stage] as const),
    { label: 'compose' },
  );
  return (value: unknown) => pipeline.run(value);
}
