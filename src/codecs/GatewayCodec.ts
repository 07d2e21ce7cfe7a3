import type { BotGateway, Gateway, SessionStartLimit } from '../models/Gateway';
import type { WireBotGateway, WireGateway, WireSessionStartLimit } from '../models/WireTypes';
import { LogContext } from '../utils/logger';
import { ValidationUtils, WireSchemas } from '../utils/validation';

function sessionStartLimitFromWire(wire: WireSessionStartLimit): SessionStartLimit {
  return {
    remaining: wire.remaining,
    resetAfter: wire.reset_after,
    total: wire.total,
    maxConcurrency: wire.max_concurrency
  };
}

export function decodeSessionStartLimit(payload: unknown, context?: LogContext): SessionStartLimit {
  return sessionStartLimitFromWire(
    ValidationUtils.assertWire(payload, WireSchemas.sessionStartLimit, 'session_start_limit', context)
  );
}

export function encodeSessionStartLimit(limit: SessionStartLimit): WireSessionStartLimit {
  return {
    remaining: limit.remaining,
    reset_after: limit.resetAfter,
    total: limit.total,
    max_concurrency: limit.maxConcurrency
  };
}

export function decodeGateway(payload: unknown, context?: LogContext): Gateway {
  const wire = ValidationUtils.assertWire(payload, WireSchemas.gateway, 'gateway', context);
  return { url: wire.url };
}

export function encodeGateway(gateway: Gateway): WireGateway {
  return { url: gateway.url };
}

export function decodeBotGateway(payload: unknown, context?: LogContext): BotGateway {
  const wire = ValidationUtils.assertWire(payload, WireSchemas.botGateway, 'gateway', context);
  return {
    sessionStartLimit: sessionStartLimitFromWire(wire.session_start_limit),
    shards: wire.shards,
    url: wire.url
  };
}

export function encodeBotGateway(gateway: BotGateway): WireBotGateway {
  return {
    session_start_limit: encodeSessionStartLimit(gateway.sessionStartLimit),
    shards: gateway.shards,
    url: gateway.url
  };
}
