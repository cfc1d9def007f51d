import { describe, expect, it } from 'vitest';
import {
  CALLBACK_RESPONSE_TYPES,
  buildInteractionCallback,
  callbackResponseCode,
  callbackResponseTypeFromCode,
  isCallbackResponseType,
} from './callback-response-type.js';

describe('callbackResponseCode', () => {
  it('maps each kind to its fixed protocol code', () => {
    expect(callbackResponseCode('message-with-source')).toBe(4);
    expect(callbackResponseCode('deferred-message-with-source')).toBe(5);
    expect(callbackResponseCode('deferred-update')).toBe(6);
    expect(callbackResponseCode('update')).toBe(7);
  });

  it('covers exactly the four kinds', () => {
    expect(CALLBACK_RESPONSE_TYPES.map(callbackResponseCode)).toEqual([4, 5, 6, 7]);
  });
});

describe('callbackResponseTypeFromCode', () => {
  it('round-trips the four codes', () => {
    expect(callbackResponseTypeFromCode(4)).toBe('message-with-source');
    expect(callbackResponseTypeFromCode(5)).toBe('deferred-message-with-source');
    expect(callbackResponseTypeFromCode(6)).toBe('deferred-update');
    expect(callbackResponseTypeFromCode(7)).toBe('update');
  });

  it.each([0, 1, 2, 3, 8, 9, 64, -4, 4.5])('rejects %s', (code) => {
    expect(callbackResponseTypeFromCode(code)).toBeNull();
  });
});

describe('isCallbackResponseType', () => {
  it('accepts known kinds only', () => {
    expect(isCallbackResponseType('update')).toBe(true);
    expect(isCallbackResponseType('pong')).toBe(false);
    expect(isCallbackResponseType('toString')).toBe(false);
    expect(isCallbackResponseType(4)).toBe(false);
  });
});

describe('buildInteractionCallback', () => {
  it('carries the code and optional data', () => {
    expect(buildInteractionCallback('deferred-update')).toEqual({ type: 6 });
    expect(buildInteractionCallback('message-with-source', { content: 'pong', flags: 64 })).toEqual({
      type: 4,
      data: { content: 'pong', flags: 64 },
    });
  });
});
