import { InvalidArgumentError } from './errors.js';

export type Maybe<T> = T | null | undefined;

export function check(condition: boolean, message: string): void {
  if (!condition) throw new InvalidArgumentError(message);
}

export function notNull<T>(value: Maybe<T>, name: string): asserts value is T {
  if (value == null) throw new InvalidArgumentError(`${name} may not be null`);
}

/** Rejects the whole collection when it, or any of its entries, is absent. */
export function noneNull<T>(values: Maybe<Iterable<Maybe<T>>>, name: string): T[] {
  notNull(values, name);
  const out: T[] = [];
  for (const value of values) {
    if (value == null) throw new InvalidArgumentError(`${name} may not contain null elements`);
    out.push(value);
  }
  return out;
}

export function notEmpty(value: string, name: string): void {
  if (value.length === 0) throw new InvalidArgumentError(`${name} may not be empty`);
}

export function notLonger(value: string, maxLength: number, name: string): void {
  if (value.length > maxLength) {
    throw new InvalidArgumentError(`${name} may not be longer than ${maxLength} characters`);
  }
}

export function isSnowflake(value: string): boolean {
  return /^\d+$/.test(value);
}

export function snowflake(value: string, name: string): void {
  if (!isSnowflake(value)) {
    throw new InvalidArgumentError(`${name} must be a valid snowflake, got "${value}"`);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
