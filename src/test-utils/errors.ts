/**
 * Assertion helpers for CircuitIrError
 */

import { isCircuitIrError, type CircuitIrError } from '../errors.js';

/**
 * Run `fn`, fail the test unless it throws a CircuitIrError, and return it
 */
export function catchCircuitIrError(fn: () => unknown): CircuitIrError {
  try {
    fn();
  } catch (error) {
    if (isCircuitIrError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a CircuitIrError to be thrown');
}

/**
 * Await `promise`, fail the test unless it rejects with a CircuitIrError, and
 * return the error
 */
export async function rejectedCircuitIrError(promise: Promise<unknown>): Promise<CircuitIrError> {
  try {
    await promise;
  } catch (error) {
    if (isCircuitIrError(error)) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a CircuitIrError to be thrown');
}
