/**
 * Attribute Collector
 *
 * Extracts the HTTP metadata recorded on a segment. Client IP resolution
 * prefers the leftmost `X-Forwarded-For` entry (the original client in a
 * proxy chain) and falls back to the connected peer.
 *
 * @module tracing/attributes
 */

import type { Entity, HttpAttributes } from './entities.js';
import type { EntityMarker } from './entityMarker.js';
import type { RequestView, ResponseView } from './requestContext.js';
import { getRequestHeader } from './requestContext.js';

export const FORWARDED_FOR_HEADER = 'x-forwarded-for';

export interface ClientAddress {
  clientIp: string | undefined;
  forwarded: boolean;
}

/**
 * First comma-separated entry of the forwarded-for header, trimmed.
 * Undefined when the header is missing or empty.
 */
export function getForwardedFor(request: RequestView): string | undefined {
  const raw = getRequestHeader(request, FORWARDED_FOR_HEADER);
  if (raw === undefined || raw.length === 0) return undefined;
  return raw.split(',')[0]?.trim();
}

export function resolveClientAddress(request: RequestView): ClientAddress {
  const forwardedFor = getForwardedFor(request);
  if (forwardedFor === undefined) {
    return { clientIp: request.remoteAddress, forwarded: false };
  }
  return { clientIp: forwardedFor, forwarded: true };
}

export function collectRequestAttributes(request: RequestView): HttpAttributes {
  const attributes: HttpAttributes = {
    url: request.url,
    method: request.method,
  };

  // Absent headers are left out rather than recorded as null.
  const userAgent = getRequestHeader(request, 'user-agent');
  if (userAgent !== undefined) attributes['user_agent'] = userAgent;

  const { clientIp, forwarded } = resolveClientAddress(request);
  if (clientIp !== undefined) attributes['client_ip'] = clientIp;
  if (forwarded) attributes['x_forwarded_for'] = true;

  return attributes;
}

/**
 * Collect the response status and flag the entity's fault/error state from it.
 */
export function collectResponseAttributes(
  response: ResponseView,
  entity: Entity,
  marker: EntityMarker,
): HttpAttributes {
  const status = Math.trunc(response.statusCode);
  marker.markEntityFromStatus(entity, status);
  return { status };
}
