import { isInvocable, validatePipelineSteps } from '../index.ts';

const increment = (x: number) => x + 2;

describe('validatePipelineSteps', () => {
  it('accepts every descriptor form', () => {
    const adder = { add: (x: number) => x };
    const scaler = { invoke: (x: number) => x * 2 };
    const calc = { scale: (by: number, x: number) => by * x };

    expect(
      validatePipelineSteps([
        ['increment', increment],
        ['scale', scaler],
        ['add', adder, 'add'],
        ['scale-by-5', calc, ['scale', { args: [5] }]],
      ]),
    ).toBe(true);
    expect(validatePipelineSteps([])).toBe(true);
  });

  it('rejects input that is not an array', () => {
    expect(() => validatePipelineSteps('steps')).toThrow('Pipeline steps must be an array');
  });

  it('rejects descriptors of the wrong length', () => {
    expect(() => validatePipelineSteps([['only-name']])).toThrow(
      'Invalid pipeline step at index 0: expected [name, target] or [name, target, method]',
    );
    expect(() => validatePipelineSteps([['increment', increment], 'increment'])).toThrow(
      'Invalid pipeline step at index 1: expected [name, target] or [name, target, method]',
    );
  });

  it('rejects a target that is not an object or function', () => {
    const check = () =>
      validatePipelineSteps([
        ['increment', increment],
        ['multiply', 'invalid'],
      ]);
    expect(check).toThrow(/^Invalid pipeline step at index 1:\n/);
    expect(check).toThrow(/Target must be an object or a function/);
  });

  it('rejects a default-call target that cannot be called', () => {
    expect(() => validatePipelineSteps([['plain', { value: 1 }]])).toThrow(
      /Target must be a function or expose an 'invoke' method/,
    );
  });

  it('rejects a step name that is not a string', () => {
    expect(() => validatePipelineSteps([[7, increment]])).toThrow(
      /^Invalid pipeline step at index 0:\n/,
    );
  });

  it('rejects a method spec of the wrong shape', () => {
    const adder = { add: (x: number) => x };
    expect(() => validatePipelineSteps([['add', adder, 42]])).toThrow(
      /^Invalid pipeline step at index 0:\n/,
    );
    expect(() => validatePipelineSteps([['add', adder, ['add', { args: 5 }]]])).toThrow(
      /^Invalid pipeline step at index 0:\n/,
    );
  });

  it('rejects a method the target does not have', () => {
    expect(() => validatePipelineSteps([['add', {}, 'add']])).toThrow(
      "Invalid pipeline step at index 0: target has no callable method 'add'",
    );
    expect(() => validatePipelineSteps([['add', { add: 1 }, ['add', { args: [] }]]])).toThrow(
      "Invalid pipeline step at index 0: target has no callable method 'add'",
    );
  });
});

describe('isInvocable', () => {
  it('recognises objects with an invoke method', () => {
    expect(isInvocable({ invoke: () => 1 })).toBe(true);
    expect(isInvocable({ invoke: 1 })).toBe(false);
    expect(isInvocable(() => 1)).toBe(false);
    expect(isInvocable(null)).toBe(false);
  });
});
