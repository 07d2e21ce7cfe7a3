import {
  Activity,
  ActivityAssets,
  ActivityEmoji,
  ActivityParty,
  ActivitySecrets,
  ActivityTimestamps,
  ActivityType
} from '../models/Activity';
import { ActivityFlags } from '../models/Flags';
import type {
  WireActivity,
  WireActivityAssets,
  WireActivityEmoji,
  WireActivityParty,
  WireActivitySecrets,
  WireActivityTimestamps
} from '../models/WireTypes';
import { LogContext } from '../utils/logger';
import { ValidationUtils, WireSchemas } from '../utils/validation';
import { decodeButtons, encodeButtons } from './ButtonCodec';
import { createEnumCodec } from './EnumCodec';

export const activityTypeCodec = createEnumCodec<ActivityType>(
  'ActivityType',
  [
    ActivityType.Playing,
    ActivityType.Streaming,
    ActivityType.Listening,
    ActivityType.Watching,
    ActivityType.Custom,
    ActivityType.Competing
  ],
  ActivityType.Unknown
);

function assetsFromWire(wire: WireActivityAssets): ActivityAssets {
  return {
    largeImage: wire.large_image ?? undefined,
    largeText: wire.large_text ?? undefined,
    smallImage: wire.small_image ?? undefined,
    smallText: wire.small_text ?? undefined
  };
}

function assetsToWire(assets: ActivityAssets): WireActivityAssets {
  return {
    large_image: assets.largeImage ?? null,
    large_text: assets.largeText ?? null,
    small_image: assets.smallImage ?? null,
    small_text: assets.smallText ?? null
  };
}

function partyFromWire(wire: WireActivityParty): ActivityParty {
  return {
    id: wire.id ?? undefined,
    size: wire.size ?? undefined
  };
}

function partyToWire(party: ActivityParty): WireActivityParty {
  return {
    id: party.id ?? null,
    size: party.size ?? null
  };
}

function secretsFromWire(wire: WireActivitySecrets): ActivitySecrets {
  return {
    join: wire.join ?? undefined,
    match: wire.match ?? undefined,
    spectate: wire.spectate ?? undefined
  };
}

function secretsToWire(secrets: ActivitySecrets): WireActivitySecrets {
  return {
    join: secrets.join ?? null,
    match: secrets.match ?? null,
    spectate: secrets.spectate ?? null
  };
}

function emojiFromWire(wire: WireActivityEmoji): ActivityEmoji {
  return {
    name: wire.name,
    id: wire.id ?? undefined,
    animated: wire.animated ?? undefined
  };
}

function emojiToWire(emoji: ActivityEmoji): WireActivityEmoji {
  return {
    name: emoji.name,
    id: emoji.id ?? null,
    animated: emoji.animated ?? null
  };
}

function timestampsFromWire(wire: WireActivityTimestamps): ActivityTimestamps {
  return {
    start: wire.start ?? undefined,
    end: wire.end ?? undefined
  };
}

function timestampsToWire(timestamps: ActivityTimestamps): WireActivityTimestamps {
  return {
    start: timestamps.start ?? null,
    end: timestamps.end ?? null
  };
}

/**
 * Convert an already validated wire activity
 */
export function activityFromWire(wire: WireActivity, context?: LogContext): Activity {
  return {
    applicationId: wire.application_id ?? undefined,
    assets: wire.assets ? assetsFromWire(wire.assets) : undefined,
    details: wire.details ?? undefined,
    flags: wire.flags === undefined || wire.flags === null
      ? undefined
      : ActivityFlags.decode(wire.flags, context),
    instance: wire.instance ?? undefined,
    kind: activityTypeCodec.decodeOptional(wire.type, context),
    name: wire.name,
    party: wire.party ? partyFromWire(wire.party) : undefined,
    secrets: wire.secrets ? secretsFromWire(wire.secrets) : undefined,
    state: wire.state ?? undefined,
    emoji: wire.emoji ? emojiFromWire(wire.emoji) : undefined,
    timestamps: wire.timestamps ? timestampsFromWire(wire.timestamps) : undefined,
    syncId: wire.sync_id ?? undefined,
    sessionId: wire.session_id ?? undefined,
    url: wire.url ?? undefined,
    buttons: decodeButtons(wire.buttons)
  };
}

/**
 * @throws GatewayEncodeError when the kind is {@link ActivityType.Unknown}
 */
export function activityToWire(activity: Activity): WireActivity {
  return {
    application_id: activity.applicationId ?? null,
    assets: activity.assets ? assetsToWire(activity.assets) : null,
    details: activity.details ?? null,
    flags: activity.flags ? ActivityFlags.encode(activity.flags) : null,
    instance: activity.instance ?? null,
    type: activityTypeCodec.encode(activity.kind, 'type'),
    name: activity.name,
    party: activity.party ? partyToWire(activity.party) : null,
    secrets: activity.secrets ? secretsToWire(activity.secrets) : null,
    state: activity.state ?? null,
    emoji: activity.emoji ? emojiToWire(activity.emoji) : null,
    timestamps: activity.timestamps ? timestampsToWire(activity.timestamps) : null,
    sync_id: activity.syncId ?? null,
    session_id: activity.sessionId ?? null,
    url: activity.url ?? null,
    buttons: encodeButtons(activity.buttons)
  };
}

export function decodeActivity(payload: unknown, context?: LogContext): Activity {
  const wire = ValidationUtils.assertWire(payload, WireSchemas.activity, 'activity', context);
  return activityFromWire(wire, context);
}

export function encodeActivity(activity: Activity): WireActivity {
  return activityToWire(activity);
}

export { decodeButtons as decodeActivityButtons };
