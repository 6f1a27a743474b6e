import * as dotenv from 'dotenv';
import path from 'path';
import { ConfigError } from './errors';

dotenv.config();

/** Blog the original deployment publishes to; override with BLOG_ID. */
const DEFAULT_BLOG_ID = '4271522061163006364';

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return parsed;
}

/**
 * Centralised environment configuration.  Values are read at *call* time so
 * tests (and dotenv) can change process.env before a service is created.
 */
export const env = {
  get BOT_TOKEN(): string {
    const token = process.env.BOT_TOKEN;
    if (!token) {
      throw new ConfigError('BOT_TOKEN is not set');
    }
    return token;
  },

  get BLOG_ID() { return process.env.BLOG_ID || DEFAULT_BLOG_ID; },

  // --- Files ---
  get CLIENT_SECRET_FILE() { return path.resolve(process.env.CLIENT_SECRET_FILE || 'client_secret.json'); },
  get TOKEN_FILE() { return path.resolve(process.env.TOKEN_FILE || 'token.json'); },
  get TEMPLATE_FILE() {
    return path.resolve(process.env.TEMPLATE_FILE || path.join('MoviePostBot', 'templates', 'post_template.html'));
  },

  // --- OAuth callback listener ---
  get OAUTH_CALLBACK_HOST() { return process.env.OAUTH_CALLBACK_HOST || '0.0.0.0'; },
  get OAUTH_CALLBACK_PORT() { return intFromEnv('OAUTH_CALLBACK_PORT', 8080); },

  // --- Sessions ---
  get REDIS_URL() { return process.env.REDIS_URL || process.env.UPSTASH_REDIS_REST_URL; },
  get SESSION_TTL_SECONDS() { return intFromEnv('SESSION_TTL_SECONDS', 60 * 60 * 24); },

  // --- Webhook ---
  get WEBHOOK_SECRET() { return process.env.WEBHOOK_SECRET; },
};

export type BotEnv = typeof env;
