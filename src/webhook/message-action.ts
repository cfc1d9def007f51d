import type { AllowedMentionsTypes } from 'discord.js';
import { type Maybe, check, noneNull, notEmpty, notLonger, notNull } from '../checks.js';
import {
  DefaultEntityBuilder,
  type EntityBuilder,
  type MessageChannelRef,
  type MessageLike,
  type WebhookMessage,
} from '../entities/message.js';
import type { LoggerLike } from '../logging.js';
import type { AttachmentSource } from '../requests/body.js';
import type { PendingRequest } from '../requests/pending-request.js';
import { getResponseObject, type RestResponse } from '../requests/response.js';
import { RestAction, type Requester } from '../requests/rest-action.js';
import { redactRoute, type CompiledRoute } from '../requests/route.js';
import {
  AllowedMentionsTracker,
  type MentionDefaults,
  type Mentionable,
} from './allowed-mentions.js';
import {
  MAX_ACTION_ROWS,
  MAX_EMBEDS,
  MAX_FILES,
  MAX_USERNAME_LENGTH,
  SPOILER_PREFIX,
  normalizeAvatarUrl,
  toWireBody,
  type ActionRowInput,
  type EmbedData,
  type MessageDraft,
  type PendingAttachment,
  type WebhookRequestBody,
} from './message-draft.js';

export type AttachmentOption = 'spoiler';

export type WebhookMessageActionOptions = {
  requester: Requester;
  route: CompiledRoute;
  /** Where the created message lives; handed to the entity builder on success. */
  channel: MessageChannelRef;
  entityBuilder?: EntityBuilder;
  mentionDefaults?: MentionDefaults;
  log?: LoggerLike;
};

/**
 * Builds a message sent through a webhook (including interaction follow-ups).
 *
 * Mutators validate eagerly and return `this`. Nothing is serialized until
 * the execution engine calls `finalizeData()`, which also hands the pending
 * attachments over to the returned body. Finalizing a second time produces a
 * body with the same fields and no attachments.
 */
export class WebhookMessageAction extends RestAction<WebhookMessage> {
  private content = '';
  private tts = false;
  private ephemeral = false;
  private username: string | undefined;
  private avatarUrl: string | undefined;
  private readonly embeds: EmbedData[] = [];
  private readonly components: ActionRowInput[] = [];
  private files = new Map<string, AttachmentSource>();
  private readonly mentions: AllowedMentionsTracker;
  private readonly channel: MessageChannelRef;
  private readonly entityBuilder: EntityBuilder;
  private finalized = 0;
  private consumedAttachments = 0;

  constructor(opts: WebhookMessageActionOptions) {
    super(opts.requester, opts.route, opts.log);
    this.channel = opts.channel;
    this.entityBuilder = opts.entityBuilder ?? new DefaultEntityBuilder();
    this.mentions = new AllowedMentionsTracker(opts.mentionDefaults);
  }

  // -- Read-only view --------------------------------------------------------

  get draft(): MessageDraft {
    return {
      content: this.content,
      tts: this.tts,
      ephemeral: this.ephemeral,
      username: this.username,
      avatarUrl: this.avatarUrl,
      embeds: [...this.embeds],
      components: [...this.components],
      allowedMentions: this.mentions.toJSON(),
    };
  }

  /** Names of attachments not yet handed to a body, in insertion order. */
  get attachmentNames(): string[] {
    return [...this.files.keys()];
  }

  get finalizeCount(): number {
    return this.finalized;
  }

  // -- Content ---------------------------------------------------------------

  /** Copy TTS, embeds, mention policy, action rows and raw content from an existing message. */
  applyMessage(message: Maybe<MessageLike>): this {
    notNull(message, 'Message');
    // The policy is the only part that validates; apply it before anything else changes.
    this.mentions.applyMessage(message);
    this.tts = message.tts;
    this.embeds.push(...message.embeds);
    this.components.push(...message.components);
    return this.setContent(message.content);
  }

  setContent(content: Maybe<string>): this {
    this.content = content ?? '';
    return this;
  }

  setTTS(tts: boolean): this {
    this.tts = tts;
    return this;
  }

  setEphemeral(ephemeral: boolean): this {
    this.ephemeral = ephemeral;
    return this;
  }

  setUsername(name: Maybe<string>): this {
    if (name != null) {
      notEmpty(name, 'Name');
      notLonger(name, MAX_USERNAME_LENGTH, 'Name');
    }
    this.username = name ?? undefined;
    return this;
  }

  setAvatarUrl(url: Maybe<string>): this {
    this.avatarUrl = normalizeAvatarUrl(url);
    return this;
  }

  addEmbeds(embeds: Maybe<Iterable<Maybe<EmbedData>>>): this {
    const checked = noneNull(embeds, 'Message Embeds');
    check(this.embeds.length + checked.length <= MAX_EMBEDS, `Cannot have more than ${MAX_EMBEDS} embeds in a message!`);
    this.embeds.push(...checked);
    return this;
  }

  addFile(name: Maybe<string>, data: Maybe<AttachmentSource>, ...options: AttachmentOption[]): this {
    notNull(name, 'Name');
    notNull(data, 'Data');
    // Counted before the add: the tenth file fits, the eleventh does not.
    check(this.files.size < MAX_FILES, `Cannot have more than ${MAX_FILES} files in a message!`);
    const finalName = options[0] === 'spoiler' ? `${SPOILER_PREFIX}${name}` : name;
    this.files.set(finalName, data);
    return this;
  }

  addActionRows(...rows: Maybe<ActionRowInput>[]): this {
    const checked = noneNull(rows, 'ActionRows');
    check(this.components.length + checked.length <= MAX_ACTION_ROWS, `Can only have ${MAX_ACTION_ROWS} action rows per message!`);
    this.components.push(...checked);
    return this;
  }

  // -- Mentions --------------------------------------------------------------

  mentionRepliedUser(mention: boolean): this {
    this.mentions.mentionRepliedUser(mention);
    return this;
  }

  allowedMentions(types: Maybe<Iterable<AllowedMentionsTypes>>): this {
    this.mentions.allowedMentions(types);
    return this;
  }

  mention(...mentions: Maybe<Mentionable>[]): this {
    this.mentions.mention(...mentions);
    return this;
  }

  mentionUsers(...userIds: Maybe<string>[]): this {
    this.mentions.mentionUsers(...userIds);
    return this;
  }

  mentionRoles(...roleIds: Maybe<string>[]): this {
    this.mentions.mentionRoles(...roleIds);
    return this;
  }

  // -- Execution -------------------------------------------------------------

  finalizeData(): WebhookRequestBody {
    const attachments = this.takeAttachments();
    this.finalized += 1;
    if (this.finalized > 1 && attachments.length === 0 && this.consumedAttachments > 0) {
      this.log.warn(
        { route: redactRoute(this.route), consumedAttachments: this.consumedAttachments },
        'webhook:finalized again after attachments were consumed; sending without them',
      );
    }
    this.consumedAttachments += attachments.length;

    const body = toWireBody(this.draft, attachments);
    this.log.debug?.(
      { route: redactRoute(this.route), type: body.type, files: attachments.length },
      'webhook:finalize',
    );
    return body;
  }

  handleSuccess(response: RestResponse, request: PendingRequest<WebhookMessage>): void {
    const message = this.entityBuilder.createMessage(getResponseObject(response), this.channel, false);
    this.log.debug?.({ route: redactRoute(this.route), messageId: message.id }, 'webhook:message created');
    request.onSuccess(message);
  }

  // Moves attachment sources out of the builder; they belong to the body from here on.
  private takeAttachments(): PendingAttachment[] {
    const taken = [...this.files].map(([name, data]) => ({ name, data }));
    this.files = new Map();
    return taken;
  }
}
