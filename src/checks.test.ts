import { describe, expect, it } from 'vitest';
import { check, isRecord, isSnowflake, noneNull, notEmpty, notLonger, notNull, snowflake } from './checks.js';
import { InvalidArgumentError } from './errors.js';

describe('checks', () => {
  it('check throws InvalidArgumentError with the given message', () => {
    expect(() => check(false, 'nope')).toThrow(new InvalidArgumentError('nope'));
    expect(() => check(true, 'nope')).not.toThrow();
  });

  it('notNull rejects null and undefined but not falsy values', () => {
    expect(() => notNull(null, 'Thing')).toThrow('Thing may not be null');
    expect(() => notNull(undefined, 'Thing')).toThrow(InvalidArgumentError);
    expect(() => notNull('', 'Thing')).not.toThrow();
    expect(() => notNull(0, 'Thing')).not.toThrow();
  });

  it('noneNull returns the entries when all are present', () => {
    expect(noneNull(new Set(['a', 'b']), 'Items')).toEqual(['a', 'b']);
    expect(() => noneNull(['a', undefined], 'Items')).toThrow('Items may not contain null elements');
    expect(() => noneNull(null, 'Items')).toThrow('Items may not be null');
  });

  it('notEmpty and notLonger check string length', () => {
    expect(() => notEmpty('', 'Name')).toThrow('Name may not be empty');
    expect(() => notLonger('abcd', 3, 'Name')).toThrow('Name may not be longer than 3 characters');
    expect(() => notLonger('abc', 3, 'Name')).not.toThrow();
  });

  it('snowflakes are digit strings', () => {
    expect(isSnowflake('1000000000000000001')).toBe(true);
    expect(isSnowflake('12a')).toBe(false);
    expect(isSnowflake('')).toBe(false);
    expect(() => snowflake('x', 'User id')).toThrow('User id must be a valid snowflake, got "x"');
  });

  it('isRecord accepts plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('x')).toBe(false);
  });
});
