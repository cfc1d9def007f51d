import { AllowedMentionsTypes } from 'discord.js';
import type { MentionDefaults } from './webhook/allowed-mentions.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const ALL_MENTION_TYPES: readonly AllowedMentionsTypes[] = [
  AllowedMentionsTypes.User,
  AllowedMentionsTypes.Role,
  AllowedMentionsTypes.Everyone,
];

export type WebhookKitConfig = {
  logLevel: LogLevel;
  /** Mention categories parsed when a builder never called `allowedMentions`. */
  defaultAllowedMentions: AllowedMentionsTypes[];
  /** Reply-ping default; undefined leaves `replied_user` out of the payload. */
  defaultMentionRepliedUser?: boolean;
};

type ParseResult = {
  config: WebhookKitConfig;
  warnings: string[];
};

function parseOptionalBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseEnum<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  allowed: readonly T[],
  defaultValue: T,
): T {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  const match = allowed.find((value) => value === normalized);
  if (match === undefined) {
    throw new Error(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function parseMentionTypes(
  raw: string | undefined,
  warnings: string[],
): AllowedMentionsTypes[] {
  if (raw == null || raw.trim() === '') return [...ALL_MENTION_TYPES];
  const out = new Set<AllowedMentionsTypes>();
  for (const part of raw.split(/[,\s]+/g)) {
    const token = part.trim().toLowerCase();
    if (!token) continue;
    if (token === 'none') continue;
    const match = ALL_MENTION_TYPES.find((type) => type === token);
    if (match === undefined) {
      warnings.push(`WEBHOOK_DEFAULT_ALLOWED_MENTIONS: ignoring unknown mention type "${part.trim()}"`);
      continue;
    }
    out.add(match);
  }
  return ALL_MENTION_TYPES.filter((type) => out.has(type));
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];

  const logLevel = parseEnum(env, 'LOG_LEVEL', LOG_LEVELS, 'info');
  const defaultAllowedMentions = parseMentionTypes(env.WEBHOOK_DEFAULT_ALLOWED_MENTIONS, warnings);
  const defaultMentionRepliedUser = parseOptionalBoolean(env, 'WEBHOOK_MENTION_REPLIED_USER');

  return {
    config: {
      logLevel,
      defaultAllowedMentions,
      defaultMentionRepliedUser,
    },
    warnings,
  };
}

export function mentionDefaultsFromConfig(config: WebhookKitConfig): MentionDefaults {
  return {
    parse: [...config.defaultAllowedMentions],
    repliedUser: config.defaultMentionRepliedUser,
  };
}
