import { AllowedMentionsTypes, type APIAllowedMentions } from 'discord.js';
import { type Maybe, noneNull, notNull, snowflake } from '../checks.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Canonical serialization order for `parse`. */
const PARSE_ORDER: readonly AllowedMentionsTypes[] = [
  AllowedMentionsTypes.User,
  AllowedMentionsTypes.Role,
  AllowedMentionsTypes.Everyone,
];

export type MentionDefaults = {
  parse: readonly AllowedMentionsTypes[];
  repliedUser?: boolean;
};

export const DEFAULT_MENTION_DEFAULTS: MentionDefaults = Object.freeze({
  parse: PARSE_ORDER,
});

/**
 * Something that can be mentioned. Users and guild members land in the
 * explicit user list, roles in the role list; other kinds (channels, emoji)
 * never notify and are ignored.
 */
export type Mentionable = {
  type: 'user' | 'member' | 'role' | 'channel' | 'emoji';
  id: string;
};

/** Source of a policy for `applyMessage`: the directive a message was sent with. */
export type MentionPolicySource = {
  allowedMentions?: APIAllowedMentions | null;
};

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

/**
 * Accumulates which mentions in a message may notify.
 *
 * A `null` category set means "use the defaults"; an explicit empty set
 * suppresses every category. Explicit user/role ids override the matching
 * coarse category at serialization time.
 */
export class AllowedMentionsTracker {
  private parse: Set<AllowedMentionsTypes> | null = null;
  private readonly users = new Set<string>();
  private readonly roles = new Set<string>();
  private repliedUser: boolean | null = null;

  constructor(private readonly defaults: MentionDefaults = DEFAULT_MENTION_DEFAULTS) {}

  mentionRepliedUser(mention: boolean): this {
    this.repliedUser = mention;
    return this;
  }

  /** Replace the coarse category set; an absent collection restores the defaults. */
  allowedMentions(types: Maybe<Iterable<Maybe<AllowedMentionsTypes>>>): this {
    this.parse = types == null ? null : new Set(noneNull(types, 'Mention types'));
    return this;
  }

  mention(...mentions: Maybe<Mentionable>[]): this {
    const checked = noneNull(mentions, 'Mentionables');
    for (const mentionable of checked) snowflake(mentionable.id, 'Mentionable id');
    for (const mentionable of checked) {
      if (mentionable.type === 'user' || mentionable.type === 'member') this.users.add(mentionable.id);
      else if (mentionable.type === 'role') this.roles.add(mentionable.id);
    }
    return this;
  }

  mentionUsers(...userIds: Maybe<string>[]): this {
    addIds(this.users, userIds, 'User id');
    return this;
  }

  mentionRoles(...roleIds: Maybe<string>[]): this {
    addIds(this.roles, roleIds, 'Role id');
    return this;
  }

  /**
   * Adopt the effective policy a message was sent with. The directive is
   * copied as-is rather than recomputed: a missing `parse` means nothing was
   * parsed, and a missing `replied_user` means the reply did not ping.
   * Messages without a directive leave the tracker untouched.
   */
  applyMessage(message: Maybe<MentionPolicySource>): this {
    notNull(message, 'Message');
    const directive = message.allowedMentions;
    if (directive == null) return this;

    const users = checkedIds(directive.users ?? [], 'User id');
    const roles = checkedIds(directive.roles ?? [], 'Role id');
    this.parse = new Set(directive.parse ?? []);
    this.users.clear();
    this.roles.clear();
    for (const id of users) this.users.add(id);
    for (const id of roles) this.roles.add(id);
    this.repliedUser = directive.replied_user ?? false;
    return this;
  }

  copy(other: AllowedMentionsTracker): this {
    this.parse = other.parse == null ? null : new Set(other.parse);
    this.users.clear();
    this.roles.clear();
    for (const id of other.users) this.users.add(id);
    for (const id of other.roles) this.roles.add(id);
    this.repliedUser = other.repliedUser;
    return this;
  }

  toJSON(): APIAllowedMentions {
    const parse = new Set(this.parse ?? this.defaults.parse);
    if (this.users.size > 0) parse.delete(AllowedMentionsTypes.User);
    if (this.roles.size > 0) parse.delete(AllowedMentionsTypes.Role);

    const out: APIAllowedMentions = {
      parse: PARSE_ORDER.filter((type) => parse.has(type)),
    };
    if (this.users.size > 0) out.users = [...this.users];
    if (this.roles.size > 0) out.roles = [...this.roles];

    const repliedUser = this.repliedUser ?? this.defaults.repliedUser;
    if (repliedUser !== undefined) out.replied_user = repliedUser;
    return out;
  }
}

function checkedIds(ids: Iterable<Maybe<string>>, name: string): string[] {
  const checked = noneNull(ids, name);
  for (const id of checked) snowflake(id, name);
  return checked;
}

function addIds(target: Set<string>, ids: Iterable<Maybe<string>>, name: string): void {
  for (const id of checkedIds(ids, name)) target.add(id);
}
