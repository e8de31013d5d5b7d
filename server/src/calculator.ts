export const DIVISION_BY_ZERO_MESSAGE = 'Division by zero is not allowed';

export type CalculatorError = {
  kind: 'DivisionByZero';
  message: string;
}

export type OperationResult =
  | { ok: true; value: number }
  | { ok: false; error: CalculatorError };

export type Operation = (a: number, b: number) => OperationResult;

export function add(a: number, b: number): number {
  return a + b;
}

export function subtract(a: number, b: number): number {
  return a - b;
}

export function multiply(a: number, b: number): number {
  return a * b;
}

/**
 * Divides `a` by `b`. A zero divisor (either sign) is reported as a
 * `DivisionByZero` error instead of yielding Infinity or NaN.
 */
export function divide(a: number, b: number): OperationResult {
  if (b === 0) {
    return { ok: false, error: { kind: 'DivisionByZero', message: DIVISION_BY_ZERO_MESSAGE } };
  }
  return { ok: true, value: a / b };
}

const total = (fn: (a: number, b: number) => number): Operation =>
  (a, b) => ({ ok: true, value: fn(a, b) });

export const OPERATION_NAMES = ['add', 'sub', 'mul', 'div'] as const;

export type OperationName = typeof OPERATION_NAMES[number];

// route path -> operation
export const OPERATIONS: Record<OperationName, Operation> = {
  add: total(add),
  sub: total(subtract),
  mul: total(multiply),
  div: divide,
};
