/**
 * Serialised OAuth credentials.  Field names follow the token endpoint's JSON
 * so the file stays readable next to Google's own tooling.
 */
export interface CredentialRecord {
  access_token: string;
  refresh_token?: string;
  /** ISO-8601 timestamp after which `access_token` is no longer accepted */
  expiry: string;
  scope: string;
  token_type: string;
}

/** Raw response of the token endpoint for both grant types. */
export interface TokenResponse {
  access_token: string;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  token_type: string;
}

export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  authUri: string;
  tokenUri: string;
}

export type AuthState =
  | { status: 'ready' }
  | { status: 'authorization_required'; authorizationUrl: string }
  | { status: 'failed'; reason: string };

export type AuthCompletion =
  | { status: 'success' }
  | { status: 'no_code_received'; message: string }
  | { status: 'error'; reason: string };

export type PublishResult =
  | { ok: true; url: string }
  | { ok: false; reason: string; authorizationUrl?: string };
