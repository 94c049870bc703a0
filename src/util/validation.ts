/**
 * Validation utility functions
 * Each helper returns the validated value or throws InvalidInputError naming the field.
 */

import { InvalidInputError } from './error-handler';

/**
 * Validate a number value
 * @param value Value to validate
 * @param name Name of the parameter (for error messages)
 * @param options Bounds; `exclusiveMin` rejects values equal to the bound
 */
export function validateNumber(
  value: unknown,
  name: string,
  options: {
    min?: number;
    max?: number;
    exclusiveMin?: number;
  } = {}
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new InvalidInputError(name, `Invalid ${name}: must be a finite number`);
  }

  if (options.min !== undefined && value < options.min) {
    throw new InvalidInputError(name, `Invalid ${name}: must be at least ${options.min}`);
  }

  if (options.exclusiveMin !== undefined && value <= options.exclusiveMin) {
    throw new InvalidInputError(name, `Invalid ${name}: must be greater than ${options.exclusiveMin}`);
  }

  if (options.max !== undefined && value > options.max) {
    throw new InvalidInputError(name, `Invalid ${name}: must be at most ${options.max}`);
  }

  return value;
}

/**
 * Validate a string value
 */
export function validateString(
  value: unknown,
  name: string,
  options: {
    minLength?: number;
  } = {}
): string {
  if (typeof value !== 'string') {
    throw new InvalidInputError(name, `Invalid ${name}: must be a string`);
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    throw new InvalidInputError(name, `Invalid ${name}: must be at least ${options.minLength} characters`);
  }

  return value;
}

/**
 * Validate an array value
 */
export function validateArray<T>(
  value: unknown,
  name: string,
  options: {
    minLength?: number;
    maxLength?: number;
    elementValidator: (element: unknown, index: number) => element is T
  }
): T[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError(name, `Invalid ${name}: must be an array`);
  }

  if (options.minLength !== undefined && value.length < options.minLength) {
    throw new InvalidInputError(name, `Invalid ${name}: must have at least ${options.minLength} elements`);
  }

  if (options.maxLength !== undefined && value.length > options.maxLength) {
    throw new InvalidInputError(name, `Invalid ${name}: must have at most ${options.maxLength} elements`);
  }

  const validated: T[] = [];
  for (let i = 0; i < value.length; i++) {
    const element: unknown = value[i];
    if (!options.elementValidator(element, i)) {
      throw new InvalidInputError(name, `Invalid ${name}: element at index ${i} failed validation`);
    }
    validated.push(element);
  }

  return validated;
}

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
