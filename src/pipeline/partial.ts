// pipeline/partial.ts
import type { AnyCallable } from './core.ts';

/**
 * Fixes the leading arguments of `fn`. The returned function takes the rest,
 * so `partial(multiply, 5)` is a single-argument step.
 */
export function partial<A, R extends unknown[], O>(
  fn: (a: A, ...rest: R) => O,
  a: A,
): (...rest: R) => O;
export function partial<A, B, R extends unknown[], O>(
  fn: (a: A, b: B, ...rest: R) => O,
  a: A,
  b: B,
): (...rest: R) => O;
export function partial<A, B, C, R extends unknown[], O>(
  fn: (a: A, b: B, c: C, ...rest: R) => O,
  a: A,
  b: B,
  c: C,
): (...rest: R) => O;
export function partial(fn: AnyCallable, ...bound: unknown[]): AnyCallable {
  return (...rest: unknown[]) => fn(...bound, ...rest);
}
