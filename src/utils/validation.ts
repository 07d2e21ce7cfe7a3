import Joi from 'joi';
import { ValidationError } from '../models/ErrorTypes';
import { ONLINE_STATUSES } from '../models/Presence';
import type {
  WireActivity,
  WireActivityAssets,
  WireActivityButton,
  WireActivityEmoji,
  WireActivityParty,
  WireActivitySecrets,
  WireActivityTimestamps,
  WireBotGateway,
  WireClientStatus,
  WireCurrentUser,
  WireGateway,
  WirePartialApplication,
  WirePartialMember,
  WirePresence,
  WirePresenceUser,
  WirePrivateChannel,
  WireReady,
  WireSessionStartLimit,
  WireUnavailableGuild,
  WireUser
} from '../models/WireTypes';
import { createDecodeError } from './errorHandler';
import { LogContext, logger } from './logger';

/**
 * Validation result interface
 */
export interface ValidationResult<T> {
  isValid: boolean;
  data?: T;
  errors?: ValidationError[];
}

const snowflake = Joi.string().pattern(/^\d{1,20}$/);
// Free text: empty strings are valid on the wire
const text = Joi.string().allow('');
const optionalString = text.allow(null);
const optionalSnowflake = snowflake.allow(null);
const optionalBoolean = Joi.boolean().allow(null);
const unsignedInt = Joi.number().integer().min(0);
const discriminator = Joi.string().pattern(/^\d{1,4}$/);
const onlineStatus = Joi.string().valid(...ONLINE_STATUSES);
const pair = Joi.array().ordered(unsignedInt.required(), unsignedInt.required());

const activityButton = Joi.object<WireActivityButton>({
  label: text.required(),
  url: optionalString
});

const activityAssets = Joi.object<WireActivityAssets>({
  large_image: optionalString,
  large_text: optionalString,
  small_image: optionalString,
  small_text: optionalString
});

const activityParty = Joi.object<WireActivityParty>({
  id: optionalString,
  size: pair.allow(null)
});

const activitySecrets = Joi.object<WireActivitySecrets>({
  join: optionalString,
  match: optionalString,
  spectate: optionalString
});

const activityEmoji = Joi.object<WireActivityEmoji>({
  name: text.required(),
  id: optionalSnowflake,
  animated: optionalBoolean
});

const activityTimestamps = Joi.object<WireActivityTimestamps>({
  start: unsignedInt.allow(null),
  end: unsignedInt.allow(null)
});

const activity = Joi.object<WireActivity>({
  application_id: optionalSnowflake,
  assets: activityAssets.allow(null),
  details: optionalString,
  flags: unsignedInt.allow(null),
  instance: optionalBoolean,
  // Any number is accepted: unrecognized codes decode to Unknown
  type: Joi.number(),
  name: text.required(),
  party: activityParty.allow(null),
  secrets: activitySecrets.allow(null),
  state: optionalString,
  emoji: activityEmoji.allow(null),
  timestamps: activityTimestamps.allow(null),
  sync_id: optionalString,
  session_id: optionalString,
  url: Joi.string().uri().allow(null),
  buttons: Joi.array().items(text, activityButton).allow(null)
});

const clientStatus = Joi.object<WireClientStatus>({
  desktop: onlineStatus.allow(null),
  mobile: onlineStatus.allow(null),
  web: onlineStatus.allow(null)
});

const partialMember = Joi.object<WirePartialMember>({
  nick: optionalString,
  roles: Joi.array().items(snowflake).required(),
  joined_at: optionalString,
  deaf: Joi.boolean().required(),
  mute: Joi.boolean().required()
});

const user = Joi.object<WireUser>({
  id: snowflake.required(),
  username: text.required(),
  discriminator: discriminator.required(),
  bot: Joi.boolean(),
  avatar: optionalString,
  public_flags: unsignedInt.allow(null),
  banner: optionalString,
  accent_color: unsignedInt.allow(null),
  member: partialMember.allow(null)
});

const currentUser = Joi.object<WireCurrentUser>({
  id: snowflake.required(),
  username: text.required(),
  discriminator: discriminator.required(),
  bot: Joi.boolean(),
  avatar: optionalString,
  email: optionalString,
  mfa_enabled: Joi.boolean(),
  verified: optionalBoolean,
  public_flags: unsignedInt.allow(null),
  banner: optionalString,
  accent_color: unsignedInt.allow(null)
});

const presenceUser = Joi.object<WirePresenceUser>({
  id: snowflake.required(),
  avatar: optionalString,
  bot: optionalBoolean,
  discriminator: discriminator.allow(null),
  email: optionalString,
  mfa_enabled: optionalBoolean,
  username: optionalString,
  verified: optionalBoolean,
  public_flags: unsignedInt.allow(null)
});

const presence = Joi.object<WirePresence>({
  activities: Joi.array().items(activity),
  client_status: clientStatus.allow(null),
  guild_id: optionalSnowflake,
  status: onlineStatus.required(),
  user: presenceUser.required()
});

const partialApplication = Joi.object<WirePartialApplication>({
  id: snowflake.required(),
  flags: unsignedInt.required()
});

const unavailableGuild = Joi.object<WireUnavailableGuild>({
  id: snowflake.required(),
  unavailable: Joi.boolean()
});

const privateChannel = Joi.object<WirePrivateChannel>({
  id: snowflake.required(),
  type: Joi.number().required(),
  last_message_id: optionalSnowflake,
  last_pin_timestamp: optionalString,
  recipients: Joi.array().items(user).required()
});

const ready = Joi.object<WireReady>({
  application: partialApplication.required(),
  guilds: Joi.array().items(unavailableGuild).required(),
  presences: Joi.array().items(presence),
  private_channels: Joi.array().items(privateChannel),
  session_id: text.required(),
  shard: pair.allow(null),
  _trace: Joi.array().items(text),
  user: currentUser.required(),
  v: unsignedInt.required()
});

const sessionStartLimit = Joi.object<WireSessionStartLimit>({
  remaining: unsignedInt.required(),
  reset_after: unsignedInt.required(),
  total: unsignedInt.required(),
  max_concurrency: unsignedInt.required()
});

const gateway = Joi.object<WireGateway>({
  url: text.required()
});

const botGateway = Joi.object<WireBotGateway>({
  session_start_limit: sessionStartLimit.required(),
  shards: unsignedInt.required(),
  url: text.required()
});

/**
 * Schemas for every gateway record this package decodes
 */
export const WireSchemas = {
  activity,
  activityButton,
  presence,
  presenceUser,
  user,
  currentUser,
  ready,
  sessionStartLimit,
  gateway,
  botGateway
};

/**
 * Format a Joi path the way a reader would write it: `presences[0].user.id`
 */
export function formatPath(path: ReadonlyArray<string | number>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    return acc ? `${acc}.${segment}` : segment;
  }, '');
}

/**
 * Validation utility class
 */
export class ValidationUtils {
  /**
   * Validate data against a Joi schema.
   *
   * Unknown keys are allowed so that fields added by newer gateway versions
   * do not break decoding. No type coercion happens.
   */
  static validate<T>(
    data: unknown,
    schema: Joi.ObjectSchema<T>,
    root: string,
    context?: LogContext
  ): ValidationResult<T> {
    const result = schema.required().validate(data, {
      abortEarly: false,
      allowUnknown: true,
      convert: false
    });

    if (result.error) {
      const validationErrors: ValidationError[] = result.error.details.map(detail => ({
        field: formatPath(detail.path) || root,
        rule: detail.type,
        message: detail.message,
        value: detail.context?.value
      }));

      validationErrors.forEach(validationError => {
        logger.validationError(
          validationError.field,
          validationError.rule,
          validationError.value,
          context
        );
      });

      return {
        isValid: false,
        errors: validationErrors
      };
    }

    return {
      isValid: true,
      data: result.value
    };
  }

  /**
   * Validate a wire payload and return it typed, or throw a GatewayDecodeError
   */
  static assertWire<T>(
    data: unknown,
    schema: Joi.ObjectSchema<T>,
    root: string,
    context?: LogContext
  ): T {
    const result = this.validate(data, schema, root, context);
    if (!result.isValid || result.data === undefined) {
      throw createDecodeError(root, result.errors ?? []);
    }
    return result.data;
  }
}
