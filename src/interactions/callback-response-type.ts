import { InteractionResponseType } from 'discord.js';

/**
 * How an interaction is acknowledged:
 * - `message-with-source`: respond with a message, showing the user's input
 * - `deferred-message-with-source`: ack now, send the message later
 * - `deferred-update`: ack a component interaction, edit its message later
 * - `update`: edit the component's message in place
 */
export type CallbackResponseType =
  | 'message-with-source'
  | 'deferred-message-with-source'
  | 'deferred-update'
  | 'update';

// Wire codes are fixed by the protocol. Never derive them from declaration order.
const CALLBACK_RESPONSE_CODES: Readonly<Record<CallbackResponseType, InteractionResponseType>> = Object.freeze({
  'message-with-source': InteractionResponseType.ChannelMessageWithSource,
  'deferred-message-with-source': InteractionResponseType.DeferredChannelMessageWithSource,
  'deferred-update': InteractionResponseType.DeferredMessageUpdate,
  update: InteractionResponseType.UpdateMessage,
});

export const CALLBACK_RESPONSE_TYPES: readonly CallbackResponseType[] = [
  'message-with-source',
  'deferred-message-with-source',
  'deferred-update',
  'update',
];

const TYPES_BY_CODE = new Map<number, CallbackResponseType>();
for (const type of CALLBACK_RESPONSE_TYPES) TYPES_BY_CODE.set(CALLBACK_RESPONSE_CODES[type], type);

export function isCallbackResponseType(value: unknown): value is CallbackResponseType {
  return typeof value === 'string' && Object.hasOwn(CALLBACK_RESPONSE_CODES, value);
}

export function callbackResponseCode(type: CallbackResponseType): number {
  return CALLBACK_RESPONSE_CODES[type];
}

/** Returns null for any integer that is not one of the four callback codes. */
export function callbackResponseTypeFromCode(code: number): CallbackResponseType | null {
  return TYPES_BY_CODE.get(code) ?? null;
}

export type InteractionCallbackBody<D> = {
  type: number;
  data?: D;
};

export function buildInteractionCallback<D>(type: CallbackResponseType, data?: D): InteractionCallbackBody<D> {
  const body: InteractionCallbackBody<D> = { type: callbackResponseCode(type) };
  if (data !== undefined) body.data = data;
  return body;
}
