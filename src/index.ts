export { InvalidArgumentError, ErrorResponseError } from './errors.js';
export { type Maybe, isSnowflake } from './checks.js';
export {
  parseConfig,
  parseMentionTypes,
  mentionDefaultsFromConfig,
  type WebhookKitConfig,
  type LogLevel,
} from './config.js';
export { createLogger, fallbackLogger, type LoggerLike } from './logging.js';

export {
  DefaultEntityBuilder,
  type ActionRowData,
  type EntityBuilder,
  type MessageAttachment,
  type MessageChannelRef,
  type MessageLike,
  type WebhookMessage,
} from './entities/message.js';

export {
  MEDIA_TYPE_JSON,
  MEDIA_TYPE_MULTIPART,
  MEDIA_TYPE_OCTET,
  type AttachmentSource,
  type MultipartPart,
  type RequestBody,
} from './requests/body.js';
export { toFormData } from './requests/form-data.js';
export { PendingRequest } from './requests/pending-request.js';
export { isSuccess, getResponseObject, type RestResponse } from './requests/response.js';
export { RestAction, type Requester } from './requests/rest-action.js';
export {
  DISCORD_API_BASE,
  interactionCallbackRoute,
  interactionFollowupRoute,
  redactRoute,
  routeUrl,
  webhookExecuteRoute,
  type CompiledRoute,
} from './requests/route.js';

export {
  AllowedMentionsTracker,
  DEFAULT_MENTION_DEFAULTS,
  type MentionDefaults,
  type Mentionable,
} from './webhook/allowed-mentions.js';
export {
  MAX_ACTION_ROWS,
  MAX_EMBEDS,
  MAX_FILES,
  MAX_USERNAME_LENGTH,
  SPOILER_PREFIX,
  buildMessagePayload,
  normalizeAvatarUrl,
  toWireBody,
  type MessageDraft,
  type WebhookMessagePayload,
  type WebhookRequestBody,
} from './webhook/message-draft.js';
export {
  WebhookMessageAction,
  type AttachmentOption,
  type WebhookMessageActionOptions,
} from './webhook/message-action.js';

export {
  CALLBACK_RESPONSE_TYPES,
  buildInteractionCallback,
  callbackResponseCode,
  callbackResponseTypeFromCode,
  isCallbackResponseType,
  type CallbackResponseType,
} from './interactions/callback-response-type.js';
