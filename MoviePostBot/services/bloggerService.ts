import { AuthCompletion, AuthState, CredentialRecord, PublishResult } from '../models/Credentials';
import { AuthExchangeError, TransportError, errorMessage } from '../errors';
import { BlogApi, BlogInfo } from './bloggerApi';
import { CredentialStore, isExpired } from './credentialStore';
import { OAuthClient } from './googleOAuthService';
import { CallbackListener } from './oauthCallbackServer';

export const COMPLETE_AUTH_TIMEOUT_MS = 30_000;

export interface BloggerServiceOptions {
  blogId: string;
  credentialStore: CredentialStore;
  blogApi: BlogApi;
  /** Builds the OAuth client; may throw when the client configuration is unusable. */
  createOAuthClient: () => OAuthClient;
  createListener: () => CallbackListener;
  /** How often `completeAuthorization` checks the listener */
  pollIntervalMs?: number;
}

/** The one authorization attempt in flight; a new attempt replaces it. */
interface PendingAuthorization {
  authorizationUrl: string;
  listener: CallbackListener;
  client: OAuthClient;
}

type Authentication =
  | { status: 'ready'; record: CredentialRecord }
  | Exclude<AuthState, { status: 'ready' }>;

/** Comma-separated labels → trimmed, non-empty list. */
export function parseLabels(labels: string): string[] {
  return labels
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * Authentication state plus the "create post" call.  All auth paths (stored
 * token, refresh, fresh authorization-code grant) go through the same
 * credential store.
 */
export class BloggerService {
  private credentials?: CredentialRecord;
  private oauthClient?: OAuthClient;
  private pending?: PendingAuthorization;
  private completing?: Promise<AuthCompletion>;

  constructor(private readonly options: BloggerServiceOptions) {}

  // Client configuration is loaded once, on the first attempt that needs it
  private getOAuthClient(): OAuthClient {
    if (!this.oauthClient) {
      this.oauthClient = this.options.createOAuthClient();
    }
    return this.oauthClient;
  }

  private async loadValidCredentials(): Promise<CredentialRecord | null> {
    const record = await this.options.credentialStore.load();
    return record && !isExpired(record) ? record : null;
  }

  async ensureAuthenticated(): Promise<AuthState> {
    const result = await this.authenticate();
    return result.status === 'ready' ? { status: 'ready' } : result;
  }

  private async authenticate(): Promise<Authentication> {
    if (this.credentials && !isExpired(this.credentials)) {
      return { status: 'ready', record: this.credentials };
    }

    let stored: CredentialRecord | null;
    try {
      stored = await this.options.credentialStore.load();
    } catch (err) {
      console.error('[bloggerService] Cannot read stored credentials', err);
      return { status: 'failed', reason: `Cannot read stored credentials: ${errorMessage(err)}` };
    }

    if (stored && !isExpired(stored)) {
      this.credentials = stored;
      return { status: 'ready', record: stored };
    }

    if (stored?.refresh_token) {
      try {
        const refreshed = await this.getOAuthClient().refresh(stored);
        await this.options.credentialStore.save(refreshed);
        this.credentials = refreshed;
        console.log('[bloggerService] Access token refreshed');
        return { status: 'ready', record: refreshed };
      } catch (err) {
        // Revoked or expired grant: only a new consent can recover
        if (err instanceof AuthExchangeError && err.oauthError === 'invalid_grant') {
          console.warn('[bloggerService] Refresh token rejected, starting a new authorization');
          return this.beginAuthorization();
        }
        return { status: 'failed', reason: errorMessage(err) };
      }
    }

    return this.beginAuthorization();
  }

  private async beginAuthorization(): Promise<Authentication> {
    let client: OAuthClient;
    try {
      client = this.getOAuthClient();
    } catch (err) {
      console.error('[bloggerService] OAuth client configuration unusable', err);
      return { status: 'failed', reason: errorMessage(err) };
    }

    if (this.pending) {
      await this.pending.listener.stop();
      this.pending = undefined;
    }

    const listener = this.options.createListener();
    try {
      await listener.start();
    } catch (err) {
      return { status: 'failed', reason: `OAuth callback server failed to start: ${errorMessage(err)}` };
    }

    const authorizationUrl = client.authorizationUrl(listener.redirectUri);
    this.pending = { authorizationUrl, listener, client };
    console.log(`[bloggerService] Authorization required, waiting for callback on ${listener.redirectUri}`);
    return { status: 'authorization_required', authorizationUrl };
  }

  /**
   * Waits (bounded) for the callback of the pending authorization, exchanges
   * the code and persists the credentials.  The listener is stopped on every
   * outcome.  Calls made while a wait is in progress share its result.
   */
  completeAuthorization(timeoutMs = COMPLETE_AUTH_TIMEOUT_MS, signal?: AbortSignal): Promise<AuthCompletion> {
    if (!this.completing) {
      this.completing = this.awaitCallback(timeoutMs, signal).finally(() => {
        this.completing = undefined;
      });
    }
    return this.completing;
  }

  private async awaitCallback(timeoutMs: number, signal?: AbortSignal): Promise<AuthCompletion> {
    const pending = this.pending;
    if (!pending) {
      try {
        const record = await this.loadValidCredentials();
        if (record) {
          this.credentials = record;
          return { status: 'success' };
        }
      } catch (err) {
        return { status: 'error', reason: `Cannot read stored credentials: ${errorMessage(err)}` };
      }
      return { status: 'error', reason: 'OAuth flow not initialized. Please start with /auth command first.' };
    }

    try {
      const code = await pending.listener.waitForCallback(timeoutMs, this.options.pollIntervalMs, signal);
      if (code) {
        const record = await pending.client.exchangeCode(code, pending.listener.redirectUri);
        await this.options.credentialStore.save(record);
        this.credentials = record;
        console.log('[bloggerService] Authorization completed, credentials saved');
        return { status: 'success' };
      }
      if (pending.listener.error) {
        return { status: 'error', reason: `OAuth error: ${pending.listener.error}` };
      }
      return {
        status: 'no_code_received',
        message: 'No authorization received. Please open the link from /auth, approve access, then try /complete_auth again.',
      };
    } catch (err) {
      console.error('[bloggerService] OAuth completion failed', err);
      return { status: 'error', reason: `OAuth completion failed: ${errorMessage(err)}` };
    } finally {
      await pending.listener.stop();
      if (this.pending === pending) this.pending = undefined;
    }
  }

  /** Single attempt – no retries. */
  async publish(title: string, htmlBody: string, labels?: string): Promise<PublishResult> {
    const auth = await this.authenticate();
    if (auth.status === 'authorization_required') {
      return { ok: false, reason: 'Authentication required', authorizationUrl: auth.authorizationUrl };
    }
    if (auth.status === 'failed') {
      return { ok: false, reason: `Authentication failed: ${auth.reason}` };
    }

    const parsedLabels = labels ? parseLabels(labels) : [];
    try {
      const post = await this.options.blogApi.insertPost(auth.record.access_token, this.options.blogId, {
        title,
        content: htmlBody,
        ...(parsedLabels.length > 0 ? { labels: parsedLabels } : {}),
      });
      const url = post.url ?? 'Unknown URL';
      console.log(`[bloggerService] Post created successfully: ${url}`);
      return { ok: true, url };
    } catch (err) {
      if (err instanceof TransportError) {
        console.error(`[bloggerService] ${err.message}`);
        return { ok: false, reason: err.message };
      }
      console.error('[bloggerService] Post creation failed', err);
      return { ok: false, reason: `Unexpected error: ${errorMessage(err)}` };
    }
  }

  /** Blog metadata for diagnostics; `null` unless already authenticated. */
  async getBlogInfo(): Promise<BlogInfo | null> {
    if (!this.credentials || isExpired(this.credentials)) return null;
    try {
      return await this.options.blogApi.getBlog(this.credentials.access_token, this.options.blogId);
    } catch (err) {
      console.error('[bloggerService] Failed to get blog info', err);
      return null;
    }
  }

  /** Tears down a pending callback listener (process shutdown). */
  async stop(): Promise<void> {
    if (this.pending) {
      await this.pending.listener.stop();
      this.pending = undefined;
    }
  }
}
