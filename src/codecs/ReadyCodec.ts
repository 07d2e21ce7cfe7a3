import { ApplicationFlags } from '../models/Flags';
import { ChannelType, PrivateChannel, Ready } from '../models/Ready';
import type { WirePrivateChannel, WireReady } from '../models/WireTypes';
import { getGatewayConfig } from '../utils/config';
import { LogContext, logger } from '../utils/logger';
import { ValidationUtils, WireSchemas } from '../utils/validation';
import { createEnumCodec } from './EnumCodec';
import { decodeKeyed, encodeKeyed } from './KeyedCollection';
import { presenceFromWire, presenceToWire } from './PresenceCodec';
import { currentUserFromWire, currentUserToWire, userFromWire, userToWire } from './UserCodec';

export const channelTypeCodec = createEnumCodec<ChannelType>(
  'ChannelType',
  [
    ChannelType.Text,
    ChannelType.Private,
    ChannelType.Voice,
    ChannelType.GroupDm,
    ChannelType.Category,
    ChannelType.News
  ],
  ChannelType.Unknown
);

export interface ReadyDecodeOptions {
  /** Protocol version to compare `v` against; defaults to GATEWAY_VERSION */
  expectedVersion?: number;
  context?: LogContext;
}

export function privateChannelFromWire(wire: WirePrivateChannel, context?: LogContext): PrivateChannel {
  return {
    id: wire.id,
    kind: channelTypeCodec.decode(wire.type, context),
    lastMessageId: wire.last_message_id ?? undefined,
    lastPinTimestamp: wire.last_pin_timestamp ?? undefined,
    recipients: wire.recipients.map(recipient => userFromWire(recipient, context))
  };
}

export function privateChannelToWire(channel: PrivateChannel): WirePrivateChannel {
  return {
    id: channel.id,
    type: channelTypeCodec.encode(channel.kind, 'type'),
    last_message_id: channel.lastMessageId ?? null,
    last_pin_timestamp: channel.lastPinTimestamp ?? null,
    recipients: channel.recipients.map(userToWire)
  };
}

export function readyFromWire(wire: WireReady, context?: LogContext): Ready {
  return {
    application: {
      id: wire.application.id,
      flags: ApplicationFlags.decode(wire.application.flags, context)
    },
    guilds: wire.guilds.map(guild => ({
      id: guild.id,
      unavailable: guild.unavailable ?? false
    })),
    presences: decodeKeyed(
      wire.presences,
      presence => presenceFromWire(presence, context),
      presence => presence.user.id,
      'presences',
      context
    ),
    privateChannels: decodeKeyed(
      wire.private_channels,
      channel => privateChannelFromWire(channel, context),
      channel => channel.id,
      'private_channels',
      context
    ),
    sessionId: wire.session_id,
    shard: wire.shard ?? undefined,
    trace: [...(wire._trace ?? [])],
    user: currentUserFromWire(wire.user, context),
    version: wire.v
  };
}

export function readyToWire(ready: Ready): WireReady {
  return {
    application: {
      id: ready.application.id,
      flags: ApplicationFlags.encode(ready.application.flags)
    },
    guilds: ready.guilds.map(guild => ({ id: guild.id, unavailable: guild.unavailable })),
    presences: encodeKeyed(ready.presences, presenceToWire),
    private_channels: encodeKeyed(ready.privateChannels, privateChannelToWire),
    session_id: ready.sessionId,
    shard: ready.shard ?? null,
    _trace: [...ready.trace],
    user: currentUserToWire(ready.user),
    v: ready.version
  };
}

/**
 * Decode the Ready event sent after identifying
 */
export function decodeReady(payload: unknown, options: ReadyDecodeOptions = {}): Ready {
  const startedAt = Date.now();
  const context: LogContext = { ...options.context, component: 'ReadyCodec' };

  const wire = ValidationUtils.assertWire(payload, WireSchemas.ready, 'ready', context);
  const ready = readyFromWire(wire, context);

  const expectedVersion = options.expectedVersion ?? getGatewayConfig().version;
  if (ready.version !== expectedVersion) {
    logger.versionMismatch(expectedVersion, ready.version, context);
  }

  logger.debug('Decoded ready payload', {
    ...context,
    operation: 'decode',
    userId: ready.user.id,
    metadata: {
      guilds: ready.guilds.length,
      presences: ready.presences.size,
      privateChannels: ready.privateChannels.size
    }
  });
  logger.performance('decode_ready', Date.now() - startedAt, context);

  return ready;
}

export function encodeReady(ready: Ready): WireReady {
  return readyToWire(ready);
}
