import type { CalculationRequest, CalculationResponse, Operation } from './types.js';

/**
 * Domain error raised when the divisor is zero. The HTTP layer maps it to a
 * 400 response; nothing here knows about HTTP.
 */
export class DivisionByZeroError extends Error {
  constructor(readonly dividend: number) {
    super('Division by zero');
    this.name = 'DivisionByZeroError';
  }
}

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
 * Plain floating-point quotient. `-0` counts as zero.
 * @throws DivisionByZeroError when `b` is zero
 */
export function divide(a: number, b: number): number {
  if (b === 0) {
    throw new DivisionByZeroError(a);
  }
  return a / b;
}

const OPERATION_FNS: Record<Operation, (a: number, b: number) => number> = {
  add,
  subtract,
  multiply,
  divide,
};

/**
 * Runs one operation and wraps the result in the response shape, echoing
 * the operands unchanged.
 */
export function calculate(operation: Operation, payload: CalculationRequest): CalculationResponse {
  const { a, b } = payload;
  return {
    operation,
    a,
    b,
    result: OPERATION_FNS[operation](a, b),
  };
}
