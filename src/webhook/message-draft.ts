import { MessageFlags, type APIAllowedMentions, type APIEmbed } from 'discord.js';
import type { Maybe } from '../checks.js';
import type { ActionRowData } from '../entities/message.js';
import {
  MEDIA_TYPE_JSON,
  MEDIA_TYPE_MULTIPART,
  MEDIA_TYPE_OCTET,
  type AttachmentSource,
  type MultipartPart,
  type RequestBody,
} from '../requests/body.js';

export const MAX_EMBEDS = 10;
export const MAX_FILES = 10;
export const MAX_ACTION_ROWS = 5;
export const MAX_USERNAME_LENGTH = 128;
export const SPOILER_PREFIX = 'SPOILER_';
export const PAYLOAD_JSON_FIELD = 'payload_json';

/** A wire value, or a builder that serializes to one (discord.js builders qualify). */
export type Encodable<T> = T | { toJSON(): T };
export type EmbedData = Encodable<APIEmbed>;
export type ActionRowInput = Encodable<ActionRowData>;

/** The message fields a builder accumulates, minus attachment data. */
export type MessageDraft = {
  content: string;
  tts: boolean;
  ephemeral: boolean;
  username?: string;
  avatarUrl?: string;
  embeds: readonly EmbedData[];
  components: readonly ActionRowInput[];
  allowedMentions: APIAllowedMentions;
};

export type PendingAttachment = {
  name: string;
  data: AttachmentSource;
};

export type WebhookMessagePayload = {
  content: string;
  tts: boolean;
  username?: string;
  avatar_url?: string;
  flags?: number;
  embeds?: APIEmbed[];
  components?: ActionRowData[];
  allowed_mentions: APIAllowedMentions;
};

export type WebhookRequestBody = RequestBody<WebhookMessagePayload>;

/** An empty avatar URL means "no override". */
export function normalizeAvatarUrl(url: Maybe<string>): string | undefined {
  return url ? url : undefined;
}

function isEncodable<T>(value: Encodable<T>): value is { toJSON(): T } {
  return typeof value === 'object' && value !== null && 'toJSON' in value && typeof value.toJSON === 'function';
}

function resolve<T>(value: Encodable<T>): T {
  return isEncodable(value) ? value.toJSON() : value;
}

export function buildMessagePayload(draft: MessageDraft): WebhookMessagePayload {
  const payload: Omit<WebhookMessagePayload, 'allowed_mentions'> = {
    content: draft.content,
    tts: draft.tts,
  };
  if (draft.username !== undefined) payload.username = draft.username;
  if (draft.avatarUrl !== undefined) payload.avatar_url = draft.avatarUrl;
  if (draft.ephemeral) payload.flags = MessageFlags.Ephemeral;
  if (draft.embeds.length > 0) payload.embeds = draft.embeds.map((embed) => resolve<APIEmbed>(embed));
  if (draft.components.length > 0) payload.components = draft.components.map((row) => resolve<ActionRowData>(row));
  return { ...payload, allowed_mentions: draft.allowedMentions };
}

/**
 * Serialize a draft. Attachments are passed in by value: the caller gives up
 * its sources here, and the returned body is the only remaining owner.
 */
export function toWireBody(draft: MessageDraft, attachments: readonly PendingAttachment[]): WebhookRequestBody {
  const payload = buildMessagePayload(draft);
  if (attachments.length === 0) {
    return { type: 'json', contentType: MEDIA_TYPE_JSON, payload };
  }

  const parts: MultipartPart[] = attachments.map((attachment, i): MultipartPart => ({
    kind: 'file',
    name: `file${i}`,
    filename: attachment.name,
    contentType: MEDIA_TYPE_OCTET,
    data: attachment.data,
  }));
  parts.push({ kind: 'field', name: PAYLOAD_JSON_FIELD, value: JSON.stringify(payload) });

  return { type: 'multipart', contentType: MEDIA_TYPE_MULTIPART, payload, parts };
}
