import { describe, expect, it } from 'vitest';
import { AllowedMentionsTypes } from 'discord.js';
import { mentionDefaultsFromConfig, parseConfig } from './config.js';

function env(overrides: Record<string, string | undefined> = {}): NodeJS.ProcessEnv {
  return { ...overrides };
}

describe('parseConfig', () => {
  it('applies defaults', () => {
    const { config, warnings } = parseConfig(env());
    expect(config).toEqual({
      logLevel: 'info',
      defaultAllowedMentions: ['users', 'roles', 'everyone'],
      defaultMentionRepliedUser: undefined,
    });
    expect(warnings).toEqual([]);
  });

  it('parses LOG_LEVEL case-insensitively', () => {
    expect(parseConfig(env({ LOG_LEVEL: ' DEBUG ' })).config.logLevel).toBe('debug');
  });

  it('throws on an unknown LOG_LEVEL', () => {
    expect(() => parseConfig(env({ LOG_LEVEL: 'loud' }))).toThrow(
      'LOG_LEVEL must be one of fatal, error, warn, info, debug, trace, silent, got "loud"',
    );
  });

  // --- default allowed mentions ---
  it('parses a subset of mention types in canonical order', () => {
    const { config } = parseConfig(env({ WEBHOOK_DEFAULT_ALLOWED_MENTIONS: 'everyone, users' }));
    expect(config.defaultAllowedMentions).toEqual([AllowedMentionsTypes.User, AllowedMentionsTypes.Everyone]);
  });

  it('"none" suppresses every category', () => {
    const { config } = parseConfig(env({ WEBHOOK_DEFAULT_ALLOWED_MENTIONS: 'none' }));
    expect(config.defaultAllowedMentions).toEqual([]);
  });

  it('drops unknown mention types with a warning', () => {
    const { config, warnings } = parseConfig(env({ WEBHOOK_DEFAULT_ALLOWED_MENTIONS: 'roles here' }));
    expect(config.defaultAllowedMentions).toEqual([AllowedMentionsTypes.Role]);
    expect(warnings).toEqual(['WEBHOOK_DEFAULT_ALLOWED_MENTIONS: ignoring unknown mention type "here"']);
  });

  // --- replied user ---
  it('parses WEBHOOK_MENTION_REPLIED_USER booleans', () => {
    expect(parseConfig(env({ WEBHOOK_MENTION_REPLIED_USER: '1' })).config.defaultMentionRepliedUser).toBe(true);
    expect(parseConfig(env({ WEBHOOK_MENTION_REPLIED_USER: 'false' })).config.defaultMentionRepliedUser).toBe(false);
    expect(parseConfig(env({ WEBHOOK_MENTION_REPLIED_USER: ' ' })).config.defaultMentionRepliedUser).toBeUndefined();
  });

  it('throws on an invalid WEBHOOK_MENTION_REPLIED_USER', () => {
    expect(() => parseConfig(env({ WEBHOOK_MENTION_REPLIED_USER: 'yes' }))).toThrow(
      'WEBHOOK_MENTION_REPLIED_USER must be "0"/"1" or "true"/"false", got "yes"',
    );
  });
});

describe('mentionDefaultsFromConfig', () => {
  it('carries both mention settings over', () => {
    const { config } = parseConfig(
      env({ WEBHOOK_DEFAULT_ALLOWED_MENTIONS: 'users', WEBHOOK_MENTION_REPLIED_USER: '0' }),
    );
    expect(mentionDefaultsFromConfig(config)).toEqual({ parse: ['users'], repliedUser: false });
  });
});
