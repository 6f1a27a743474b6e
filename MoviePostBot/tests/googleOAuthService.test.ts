import axios, { AxiosError, AxiosHeaders } from 'axios';
import * as path from 'path';
import { BLOGGER_SCOPE, GoogleOAuthClient, loadClientConfig } from '../services/googleOAuthService';
import { AuthExchangeError, ConfigError } from '../errors';

const fixture = (name: string) => path.resolve(__dirname, 'fixtures', name);

describe('loadClientConfig', () => {
  it('reads the installed client section', () => {
    expect(loadClientConfig(fixture('client_secret.json'))).toEqual({
      clientId: 'test-client-id.apps.googleusercontent.com',
      clientSecret: 'test-secret',
      authUri: 'https://accounts.google.com/o/oauth2/auth',
      tokenUri: 'https://oauth2.googleapis.com/token',
    });
  });

  it('rejects a section without a client secret', () => {
    expect(() => loadClientConfig(fixture('client_secret_incomplete.json'))).toThrow(ConfigError);
  });

  it('rejects a missing file', () => {
    expect(() => loadClientConfig(fixture('no_such_secret.json'))).toThrow(
      /^Cannot read OAuth client configuration /,
    );
  });
});

describe('GoogleOAuthClient', () => {
  const client = new GoogleOAuthClient({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    authUri: 'https://accounts.example.org/auth',
    tokenUri: 'https://accounts.example.org/token',
  });

  it('builds an offline consent URL for the Blogger scope', () => {
    const url = new URL(client.authorizationUrl('http://localhost:8080'));

    expect(`${url.origin}${url.pathname}`).toBe('https://accounts.example.org/auth');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      client_id: 'test-client',
      redirect_uri: 'http://localhost:8080',
      response_type: 'code',
      scope: BLOGGER_SCOPE,
      access_type: 'offline',
      prompt: 'consent',
    });
  });

  it('refuses to refresh without a refresh token', async () => {
    await expect(
      client.refresh({ access_token: 'a', expiry: '2020-01-01T00:00:00.000Z', scope: '', token_type: 'Bearer' }),
    ).rejects.toThrow(new AuthExchangeError('Token refresh failed: no refresh token stored'));
  });

  it('carries the OAuth error code of a rejected refresh', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const response = {
      data: { error: 'invalid_grant', error_description: 'Token has been expired or revoked.' },
      status: 400,
      statusText: 'Bad Request',
      headers: {},
      config: { headers: new AxiosHeaders() },
    };
    const post = jest
      .spyOn(axios, 'post')
      .mockRejectedValue(new AxiosError('Request failed with status code 400', 'ERR_BAD_REQUEST', undefined, undefined, response));

    const refreshing = client.refresh({
      access_token: 'a',
      refresh_token: 'test-refresh',
      expiry: '2020-01-01T00:00:00.000Z',
      scope: '',
      token_type: 'Bearer',
    });

    await expect(refreshing).rejects.toMatchObject({
      oauthError: 'invalid_grant',
      message:
        'Token refresh failed: 400 - {"error":"invalid_grant","error_description":"Token has been expired or revoked."}',
    });
    expect(post.mock.calls[0][0]).toBe('https://accounts.example.org/token');
    jest.restoreAllMocks();
  });
});
