/**
 * Action API key gate.
 *
 * Validates the X-API-Key header against ACTIONS_API_KEY (comma-separated,
 * so a key can be rotated without downtime). With no key configured the
 * gate is open unless ACTIONS_REQUIRE_KEY=true, in which case it refuses
 * every request.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { getAuthConfig } from '../common/config';

export const API_KEY_HEADER = 'x-api-key';

export type KeyCheck = 'open' | 'accepted' | 'rejected';

export function checkApiKey(presented: string | string[] | undefined): KeyCheck {
  const { apiKeys, requireKey } = getAuthConfig();
  if (apiKeys.length === 0) return requireKey ? 'rejected' : 'open';
  const key = (Array.isArray(presented) ? presented[0] : presented)?.trim() || '';
  return key && apiKeys.includes(key) ? 'accepted' : 'rejected';
}

/**
 * Fastify preHandler for action routes.
 */
export async function apiKeyGate(request: FastifyRequest, reply: FastifyReply) {
  if (checkApiKey(request.headers[API_KEY_HEADER]) !== 'rejected') return;
  return reply.code(401).send({
    error: 'INVALID_API_KEY',
    message: 'A valid X-API-Key header is required.',
  });
}

export function hasApiKeys(): boolean {
  return getAuthConfig().apiKeys.length > 0;
}
