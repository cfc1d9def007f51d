import {
  ComponentType,
  MessageFlags,
  type APIActionRowComponent,
  type APIAllowedMentions,
  type APIEmbed,
  type APIMessageActionRowComponent,
} from 'discord.js';
import { isRecord } from '../checks.js';

export type ActionRowData = APIActionRowComponent<APIMessageActionRowComponent>;

/** The channel (or thread) a webhook message is delivered into. */
export type MessageChannelRef = {
  id: string;
  guildId?: string;
};

/** What `applyMessage` copies from: any message with these fields will do. */
export type MessageLike = {
  content: string;
  tts: boolean;
  embeds: readonly APIEmbed[];
  components: readonly ActionRowData[];
  allowedMentions?: APIAllowedMentions | null;
};

export type MessageAttachment = {
  id: string;
  filename: string;
  url: string;
  size: number;
  contentType?: string;
};

export type WebhookMessage = MessageLike & {
  id: string;
  channelId: string;
  channel: MessageChannelRef;
  webhookId?: string;
  authorId?: string;
  authorName?: string;
  flags: number;
  ephemeral: boolean;
  attachments: MessageAttachment[];
  timestamp?: string;
  /** False when the message was built from a REST response rather than a gateway cache. */
  cacheBacked: boolean;
};

export interface EntityBuilder {
  createMessage(payload: Record<string, unknown>, channel: MessageChannelRef, cacheBacked: boolean): WebhookMessage;
}

// ---------------------------------------------------------------------------
// Payload helpers
// ---------------------------------------------------------------------------

function requireString(payload: Record<string, unknown>, key: string): string {
  const value = payload[key];
  if (typeof value !== 'string' || value === '') {
    throw new TypeError(`Message payload is missing "${key}"`);
  }
  return value;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function records(value: unknown): Record<string, unknown>[] {
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

function toAttachment(raw: Record<string, unknown>): MessageAttachment | null {
  const id = optionalString(raw.id);
  const filename = optionalString(raw.filename);
  const url = optionalString(raw.url);
  if (!id || !filename || !url) return null;
  return {
    id,
    filename,
    url,
    size: typeof raw.size === 'number' ? raw.size : 0,
    contentType: optionalString(raw.content_type),
  };
}

// Embeds and rows stay opaque: they are carried through as the API sent them.
function isEmbed(value: unknown): value is APIEmbed {
  return isRecord(value);
}

function isActionRow(value: unknown): value is ActionRowData {
  return isRecord(value) && value.type === ComponentType.ActionRow && Array.isArray(value.components);
}

function toEmbeds(value: unknown): APIEmbed[] {
  return Array.isArray(value) ? value.filter(isEmbed) : [];
}

function toActionRows(value: unknown): ActionRowData[] {
  return Array.isArray(value) ? value.filter(isActionRow) : [];
}

// ---------------------------------------------------------------------------
// Default builder
// ---------------------------------------------------------------------------

/**
 * Maps a raw message payload (as returned by the execute-webhook endpoint
 * with `wait=true`) onto a `WebhookMessage`.
 */
export class DefaultEntityBuilder implements EntityBuilder {
  createMessage(payload: Record<string, unknown>, channel: MessageChannelRef, cacheBacked: boolean): WebhookMessage {
    const id = requireString(payload, 'id');
    const channelId = optionalString(payload.channel_id) ?? channel.id;
    const flags = typeof payload.flags === 'number' ? payload.flags : 0;
    const author = isRecord(payload.author) ? payload.author : undefined;

    return {
      id,
      channelId,
      channel,
      content: optionalString(payload.content) ?? '',
      tts: payload.tts === true,
      embeds: toEmbeds(payload.embeds),
      components: toActionRows(payload.components),
      webhookId: optionalString(payload.webhook_id),
      authorId: optionalString(author?.id),
      authorName: optionalString(author?.username),
      flags,
      ephemeral: (flags & MessageFlags.Ephemeral) !== 0,
      attachments: records(payload.attachments)
        .map(toAttachment)
        .filter((a): a is MessageAttachment => a !== null),
      timestamp: optionalString(payload.timestamp),
      cacheBacked,
    };
  }
}
