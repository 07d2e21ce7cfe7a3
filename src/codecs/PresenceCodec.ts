import type { ClientStatus, Presence } from '../models/Presence';
import type { WireClientStatus, WirePresence } from '../models/WireTypes';
import { LogContext } from '../utils/logger';
import { ValidationUtils, WireSchemas } from '../utils/validation';
import { activityFromWire, activityToWire } from './ActivityCodec';
import { presenceUserFromWire, presenceUserToWire } from './UserCodec';

function clientStatusFromWire(wire: WireClientStatus): ClientStatus {
  return {
    desktop: wire.desktop ?? undefined,
    mobile: wire.mobile ?? undefined,
    web: wire.web ?? undefined
  };
}

function clientStatusToWire(status: ClientStatus): WireClientStatus {
  return {
    desktop: status.desktop ?? null,
    mobile: status.mobile ?? null,
    web: status.web ?? null
  };
}

export function presenceFromWire(wire: WirePresence, context?: LogContext): Presence {
  const presenceContext: LogContext = { ...context, userId: wire.user.id };

  return {
    activities: (wire.activities ?? []).map(activity => activityFromWire(activity, presenceContext)),
    clientStatus: wire.client_status ? clientStatusFromWire(wire.client_status) : undefined,
    guildId: wire.guild_id ?? undefined,
    status: wire.status,
    user: presenceUserFromWire(wire.user, presenceContext)
  };
}

export function presenceToWire(presence: Presence): WirePresence {
  return {
    activities: presence.activities.map(activityToWire),
    client_status: presence.clientStatus ? clientStatusToWire(presence.clientStatus) : null,
    guild_id: presence.guildId ?? null,
    status: presence.status,
    user: presenceUserToWire(presence.user)
  };
}

export function decodePresence(payload: unknown, context?: LogContext): Presence {
  return presenceFromWire(
    ValidationUtils.assertWire(payload, WireSchemas.presence, 'presence', context),
    context
  );
}

export const encodePresence = presenceToWire;
