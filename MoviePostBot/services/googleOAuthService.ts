import axios from 'axios';
import * as fs from 'fs';
import { CredentialRecord, OAuthClientConfig, TokenResponse } from '../models/Credentials';
import { AuthExchangeError, ConfigError, errorMessage } from '../errors';

/** The only scope the bot ever asks for. */
export const BLOGGER_SCOPE = 'https://www.googleapis.com/auth/blogger';

const DEFAULT_AUTH_URI = 'https://accounts.google.com/o/oauth2/auth';
const DEFAULT_TOKEN_URI = 'https://oauth2.googleapis.com/token';
const REQUEST_TIMEOUT = 15_000;

/** Authorization-code grant operations the publishing client relies on. */
export interface OAuthClient {
  authorizationUrl(redirectUri: string): string;
  exchangeCode(code: string, redirectUri: string): Promise<CredentialRecord>;
  refresh(record: CredentialRecord): Promise<CredentialRecord>;
}

function stringProp(obj: object, key: string): string | undefined {
  const value: unknown = Reflect.get(obj, key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Reads Google's downloaded `client_secret.json` (either the "installed" or
 * the "web" flavour).  Throws ConfigError when the file is missing or lacks
 * the client id/secret.
 */
export function loadClientConfig(filePath: string): OAuthClientConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Cannot read OAuth client configuration ${filePath}: ${errorMessage(err)}`);
  }

  const section: unknown =
    typeof parsed === 'object' && parsed != null
      ? Reflect.get(parsed, 'installed') ?? Reflect.get(parsed, 'web')
      : undefined;
  if (typeof section !== 'object' || section == null) {
    throw new ConfigError(`${filePath} has neither an "installed" nor a "web" client section`);
  }

  const clientId = stringProp(section, 'client_id');
  const clientSecret = stringProp(section, 'client_secret');
  if (!clientId || !clientSecret) {
    throw new ConfigError(`${filePath} is missing client_id or client_secret`);
  }

  return {
    clientId,
    clientSecret,
    authUri: stringProp(section, 'auth_uri') ?? DEFAULT_AUTH_URI,
    tokenUri: stringProp(section, 'token_uri') ?? DEFAULT_TOKEN_URI,
  };
}

function describeAxiosError(err: unknown): string {
  if (axios.isAxiosError(err) && err.response) {
    const body = typeof err.response.data === 'string' ? err.response.data : JSON.stringify(err.response.data);
    return `${err.response.status} - ${body}`;
  }
  return errorMessage(err);
}

function oauthErrorCode(err: unknown): string | undefined {
  if (!axios.isAxiosError(err)) return undefined;
  const data: unknown = err.response?.data;
  if (typeof data !== 'object' || data == null || !('error' in data)) return undefined;
  return typeof data.error === 'string' ? data.error : undefined;
}

function toRecord(data: TokenResponse, previous?: CredentialRecord): CredentialRecord {
  return {
    access_token: data.access_token,
    // Refresh responses usually omit the refresh token – keep the old one
    refresh_token: data.refresh_token ?? previous?.refresh_token,
    expiry: new Date(Date.now() + data.expires_in * 1000).toISOString(),
    scope: data.scope ?? previous?.scope ?? BLOGGER_SCOPE,
    token_type: data.token_type,
  };
}

export class GoogleOAuthClient implements OAuthClient {
  constructor(private readonly config: OAuthClientConfig) {}

  authorizationUrl(redirectUri: string): string {
    const params = new URLSearchParams({
      client_id: this.config.clientId,
      redirect_uri: redirectUri,
      response_type: 'code',
      scope: BLOGGER_SCOPE,
      access_type: 'offline',
      prompt: 'consent',
    });
    return `${this.config.authUri}?${params}`;
  }

  private async requestToken(params: Record<string, string>): Promise<TokenResponse> {
    const { data } = await axios.post<TokenResponse>(
      this.config.tokenUri,
      new URLSearchParams({
        client_id: this.config.clientId,
        client_secret: this.config.clientSecret,
        ...params,
      }).toString(),
      {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded', Accept: 'application/json' },
        timeout: REQUEST_TIMEOUT,
      },
    );
    return data;
  }

  async exchangeCode(code: string, redirectUri: string): Promise<CredentialRecord> {
    try {
      const data = await this.requestToken({ code, grant_type: 'authorization_code', redirect_uri: redirectUri });
      return toRecord(data);
    } catch (err) {
      console.error('[googleOAuthService] Token exchange failed', err);
      throw new AuthExchangeError(`Token exchange failed: ${describeAxiosError(err)}`, oauthErrorCode(err));
    }
  }

  async refresh(record: CredentialRecord): Promise<CredentialRecord> {
    if (!record.refresh_token) {
      throw new AuthExchangeError('Token refresh failed: no refresh token stored');
    }
    try {
      const data = await this.requestToken({ refresh_token: record.refresh_token, grant_type: 'refresh_token' });
      return toRecord(data, record);
    } catch (err) {
      console.error('[googleOAuthService] Token refresh failed', err);
      throw new AuthExchangeError(`Token refresh failed: ${describeAxiosError(err)}`, oauthErrorCode(err));
    }
  }
}
