/**
 * Error classes thrown inside the services.  None of them reach the user as an
 * exception: the services translate them into result values or reply text.
 */

export class BotError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'BotError';
  }
}

/** Missing or malformed configuration (env, client secret file). */
export class ConfigError extends BotError {
  constructor(message: string) {
    super(message, 'CONFIG');
    this.name = 'ConfigError';
  }
}

/**
 * Authorization-code exchange or token refresh was rejected.  `oauthError` is
 * the token endpoint's `error` code (e.g. `invalid_grant`) when it sent one.
 */
export class AuthExchangeError extends BotError {
  constructor(message: string, public readonly oauthError?: string) {
    super(message, 'AUTH_EXCHANGE');
    this.name = 'AuthExchangeError';
  }
}

/** The Blogger API answered with a non-2xx status. */
export class TransportError extends BotError {
  constructor(public status: number, public body: string) {
    super(`HTTP Error: ${status} - ${body}`, 'TRANSPORT');
    this.name = 'TransportError';
  }
}

/** Template document could not be read. */
export class TemplateError extends BotError {
  constructor(message: string) {
    super(message, 'TEMPLATE');
    this.name = 'TemplateError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'Unknown error';
}
