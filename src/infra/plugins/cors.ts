/**
 * CORS plugin for Fastify
 *
 * The API is read-only, so only GET and preflight requests are allowed.
 * Origins come from ALLOWED_ORIGINS and CLIENT_BASE_URL; in development any
 * localhost origin is accepted as well.
 */

import cors from '@fastify/cors';

import type { AppConfig } from '../config/env.js';
import type { FastifyInstance } from 'fastify';

export interface CorsPolicy {
  allowedOrigins: ReadonlySet<string>;
  allowLocalhost: boolean;
}

export function buildCorsPolicy(config: AppConfig): CorsPolicy {
  const allowedOrigins = new Set<string>();

  for (const origin of (config.cors.allowedOrigins ?? '').split(',')) {
    if (origin.trim() !== '') allowedOrigins.add(origin.trim());
  }

  const clientBaseUrl = config.cors.clientBaseUrl?.trim() ?? '';
  if (clientBaseUrl !== '') allowedOrigins.add(clientBaseUrl);

  return { allowedOrigins, allowLocalhost: config.server.isDevelopment };
}

function isLocalhostOrigin(origin: string): boolean {
  if (!URL.canParse(origin)) return false;

  const url = new URL(origin);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') return false;

  // URL keeps the brackets of IPv6 hosts
  return url.hostname === 'localhost' || url.hostname === '127.0.0.1' || url.hostname === '[::1]';
}

/**
 * Requests without an Origin header (server-to-server, same origin) are always allowed.
 */
export function isOriginAllowed(origin: string | undefined, policy: CorsPolicy): boolean {
  if (origin === undefined || origin === '') return true;
  if (policy.allowedOrigins.has(origin)) return true;
  return policy.allowLocalhost && isLocalhostOrigin(origin);
}

export async function registerCors(fastify: FastifyInstance, config: AppConfig): Promise<void> {
  const policy = buildCorsPolicy(config);

  await fastify.register(cors, {
    // A disallowed origin gets no CORS headers; the browser blocks the response
    origin: (origin, cb) => {
      cb(null, isOriginAllowed(origin, policy));
    },
    methods: ['GET', 'HEAD', 'OPTIONS'],
    allowedHeaders: ['content-type', 'accept', 'x-requested-with'],
    exposedHeaders: ['content-length'],
    credentials: false,
  });
}
